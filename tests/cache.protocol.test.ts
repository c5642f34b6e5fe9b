import { describe, it } from "mocha";
import { expect } from "chai";

import { decodeCacheEntry, deriveCacheKey, encodeCacheEntry, matchCacheEntry } from "../src/cache/protocol.js";

describe("cache protocol", () => {
  it("prefixes keys verbatim", () => {
    expect(deriveCacheKey("search:", "abc")).to.equal("search:abc");
    expect(deriveCacheKey("", "abc")).to.equal("abc");
  });

  it("encodes sets and maps through the shared replacer", () => {
    expect(encodeCacheEntry(new Map([["a", 1]]), "v1")).to.equal('{"data":{"a":1},"validator":"v1"}');
    expect(encodeCacheEntry(new Set([1, 2]), null)).to.equal('{"data":[1,2],"validator":null}');
  });

  it("rejects documents that are not cache entries", () => {
    expect(decodeCacheEntry("not json")).to.equal(null);
    expect(decodeCacheEntry('{"data":1}')).to.equal(null);
    expect(decodeCacheEntry('{"data":1,"validator":null,"extra":true}')).to.equal(null);
    expect(decodeCacheEntry('{"data":[1],"validator":"v"}')).to.deep.equal({ data: [1], validator: "v" });
  });

  it("classifies lookups", () => {
    const stored = encodeCacheEntry({ answer: 42 }, "v1");

    expect(matchCacheEntry(null, null)).to.deep.equal({ kind: "miss", reason: "absent" });
    expect(matchCacheEntry("{", null)).to.deep.equal({ kind: "miss", reason: "undecodable" });
    expect(matchCacheEntry(stored, "v2")).to.deep.equal({ kind: "miss", reason: "validator_mismatch" });
    expect(matchCacheEntry(stored, "v1")).to.deep.equal({ kind: "hit", data: { answer: 42 } });
    expect(matchCacheEntry(stored, null)).to.deep.equal({ kind: "hit", data: { answer: 42 } });
  });

  it("hits entries whose payload was undefined", () => {
    expect(matchCacheEntry(encodeCacheEntry(undefined, null), null)).to.deep.equal({ kind: "hit", data: undefined });
  });
});
