/**
 * Resolved collector settings. Built once at process start (see loadSettings)
 * and passed explicitly into the retry client, collector and session manager.
 */
export interface CollectorSettings {
  /** Organization whose events-stream is collected. */
  readonly orgId: string;
  /** Static bearer token; pre-provisioned. */
  readonly apiToken: string;
  /** Base of the organizations API, without the org segment. */
  readonly apiBaseUrl: string;
  /** `limit` query parameter for every page. */
  readonly pageSize: number;
  /** Attempt budget per page, shared by rate-limit waits and transport failures. */
  readonly maxRetries: number;
  readonly retryBaseSeconds: number;
  readonly requestTimeoutSeconds: number;
  /** Directory session logs are written to as `{sessionName}.log`. */
  readonly logsDir: string;
}

/** Listen address for the HTTP control surface. */
export interface CollectorServerSettings {
  readonly port: number;
  readonly host: string;
}

/**
 * Config file shape (audit-collector.config.json, or the default export of
 * audit-collector.config.js). Every field is optional; environment variables
 * take precedence over the file.
 */
export interface CollectorConfigFile {
  orgId?: string;
  apiToken?: string;
  apiBaseUrl?: string;
  pageSize?: number;
  maxRetries?: number;
  retryBaseSeconds?: number;
  requestTimeoutSeconds?: number;
  logsDir?: string;
  server?: {
    port?: number;
    host?: string;
  };
}
