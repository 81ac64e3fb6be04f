import { describe, it, expect } from "vitest";
import { isRecord, normalizeEvent } from "./normalize.js";

describe("normalizeEvent", () => {
  it("flattens a complete event", () => {
    const record = normalizeEvent({
      id: "evt-1",
      attributes: {
        time: "2024-01-01T00:00:00Z",
        action: "user_login",
        actor: { name: "Kim Minsu", email: "kim@example.com" },
        location: { ip: "10.0.0.1" },
      },
    });
    expect(record).toEqual({
      time: "2024-01-01T00:00:00Z",
      action: "user_login",
      actor_name: "Kim Minsu",
      actor_email: "kim@example.com",
      ip: "10.0.0.1",
      event_id: "evt-1",
    });
  });

  it("yields null actor fields when the actor is missing or not an object", () => {
    const missing = normalizeEvent({ id: "e", attributes: { action: "x" } });
    expect(missing.actor_name).toBeNull();
    expect(missing.actor_email).toBeNull();
    const scalar = normalizeEvent({ id: "e", attributes: { actor: "someone" } });
    expect(scalar.actor_name).toBeNull();
  });

  it("keeps the id when attributes is null", () => {
    expect(normalizeEvent({ id: 123, attributes: null })).toEqual({
      time: null,
      action: null,
      actor_name: null,
      actor_email: null,
      ip: null,
      event_id: "123",
    });
  });

  it("is total over non-object input", () => {
    for (const raw of [null, undefined, "x", 5, [1, 2]]) {
      expect(Object.values(normalizeEvent(raw)).every((v) => v === null)).toBe(true);
    }
  });
});

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});
