import { expect, test } from "vitest";
import { canonicalJson, generateHash, generateId, nowIso, sequentialIdentity, sha256 } from "../src";

test("canonical json sorts keys recursively and stringifies non-primitives", () => {
  const value = {
    b: [{ d: 1, c: 2 }],
    a: new Date("1970-01-01T00:00:00.000Z"),
    skipped: undefined,
    big: 10n
  };
  expect(canonicalJson(value)).toBe('{"a":"1970-01-01T00:00:00.000Z","b":[{"c":2,"d":1}],"big":"10"}');
});

test("snapshot hash is a 16 character prefix of the canonical sha256", () => {
  const snapshot = { account: "acme", tier: "gold" };
  const hash = generateHash(snapshot);
  expect(hash).toMatch(/^[0-9a-f]{16}$/);
  expect(hash).toBe(sha256('{"account":"acme","tier":"gold"}').slice(0, 16));
});

test("snapshot hash ignores key order but not values", () => {
  const first = generateHash({ id: "42", owner: { name: "Ada", region: "eu" } });
  const reordered = generateHash({ owner: { region: "eu", name: "Ada" }, id: "42" });
  const changed = generateHash({ id: "42", owner: { name: "Ada", region: "us" } });

  expect(first).toBe(reordered);
  expect(first).toBe(generateHash({ id: "42", owner: { name: "Ada", region: "eu" } }));
  expect(changed).not.toBe(first);
});

test("random ids are uuids", () => {
  const first = generateId();
  expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  expect(generateId()).not.toBe(first);
});

test("sequential identities produce numbered ids and a stepped clock", () => {
  const identity = sequentialIdentity({ start: "2024-01-01T00:00:00.000Z", stepMs: 1000, prefix: "run" });

  expect(generateId(identity)).toBe("run-0001");
  expect(generateId(identity)).toBe("run-0002");
  expect(nowIso(identity)).toBe("2024-01-01T00:00:00.000Z");
  expect(nowIso(identity)).toBe("2024-01-01T00:00:01.000Z");
});

test("sequential identities do not share counters", () => {
  const first = sequentialIdentity({ prefix: "a" });
  const second = sequentialIdentity({ prefix: "a" });
  first.nextId();

  expect(second.nextId()).toBe("a-0001");
  expect(first.nextId()).toBe("a-0002");
});
