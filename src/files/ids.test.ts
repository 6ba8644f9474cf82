import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { formatFileRefs, idBody, idTime, isFileID, isIDBody, newFileID, parseFileRefs } from "./ids.js";

describe("file ids", () => {
  it("generates lowercase df- prefixed ids", () => {
    const id = newFileID();
    assert.match(id, /^df-[0-9a-z]{26}$/);
    assert.ok(isFileID(id));
    assert.equal(id, id.toLowerCase());
  });

  it("generates strictly increasing ids, even within one millisecond", () => {
    const now = Date.now();
    const ids = Array.from({ length: 50 }, () => newFileID(now));
    for (let i = 1; i < ids.length; i++) {
      const prev = ids[i - 1] ?? "";
      const cur = ids[i] ?? "";
      assert.ok(cur > prev, `${cur} should sort after ${prev}`);
    }
  });

  it("embeds the creation time", () => {
    // Ahead of every id generated so far, so the monotonic factory takes it as given
    const t = Date.now() + 24 * 60 * 60 * 1000;
    const id = newFileID(t);
    assert.equal(idTime(id), t);
    assert.equal(idTime(idBody(id)), t);
  });

  it("rejects malformed ids", () => {
    assert.equal(isFileID("df-short"), false);
    assert.equal(isFileID("xx-01hqz8y7k9m2n3p4q5r6s7t8v9"), false);
    // u is not in the ULID alphabet
    assert.equal(isFileID("df-01hqz8y7k9m2n3p4q5r6s7t8vu"), false);
    assert.equal(isFileID(42), false);
    assert.equal(isIDBody("01hqz8y7k9m2n3p4q5r6s7t8v9"), true);
  });
});

describe("file references", () => {
  const a = "df-01hqz8y7k9m2n3p4q5r6s7t8v9";
  const b = "df-01hqz8y7k9m2n3p4q5r6s7t8vz";

  it("parses single ids, JSON arrays and arrays", () => {
    assert.deepEqual(parseFileRefs(a), [a]);
    assert.deepEqual(parseFileRefs(`["${a}", "${b}"]`), [a, b]);
    assert.deepEqual(parseFileRefs([a, 3, "nope", b]), [a, b]);
  });

  it("treats empty and unparseable values as no files", () => {
    assert.deepEqual(parseFileRefs(null), []);
    assert.deepEqual(parseFileRefs(""), []);
    assert.deepEqual(parseFileRefs("[not json"), []);
    assert.deepEqual(parseFileRefs("plain text"), []);
  });

  it("formats a list as a JSON array", () => {
    assert.equal(formatFileRefs([a, "bogus", b]), `["${a}","${b}"]`);
    assert.deepEqual(parseFileRefs(formatFileRefs([b, a])), [b, a]);
  });
});
