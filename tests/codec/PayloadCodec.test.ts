import { describe, it, expect } from "vitest";
import { encodeGreeting, decodeGreeting } from "../../src/codec/PayloadCodec.js";
import { DecodeError } from "../../src/errors.js";
import { ALICE, BOB, withBadUtf8, withDirtyAddress } from "../helpers/fixtures.js";

describe("PayloadCodec", () => {
  it("decodes what it encodes", () => {
    expect(decodeGreeting(encodeGreeting("hello", ALICE))).toEqual({ text: "hello", sender: ALICE });
    expect(decodeGreeting(encodeGreeting("héllo wörld 👋", BOB))).toEqual({ text: "héllo wörld 👋", sender: BOB });
  });

  it("returns the sender in checksum form", () => {
    const sender = "0x8ba1f109551bd432803012645ac136ddd64dba72";
    const decoded = decodeGreeting(encodeGreeting("hi", sender));
    expect(decoded.sender).toBe("0x8ba1f109551bD432803012645Ac136ddd64DBA72");
  });

  it("lays the greeting out as an ABI (string, address) tuple", () => {
    const expected =
      "0x" +
      "0".repeat(62) + "40" +          // offset of the string
      "0".repeat(24) + "2".repeat(40) + // sender
      "0".repeat(63) + "2" +           // string length
      "6869" + "0".repeat(60);         // "hi", right-padded
    expect(encodeGreeting("hi", ALICE)).toBe(expected);
  });

  it("accepts byte arrays as well as hex strings", () => {
    const bytes = Uint8Array.from(Buffer.from(encodeGreeting("bytes", ALICE).slice(2), "hex"));
    expect(decodeGreeting(bytes)).toEqual({ text: "bytes", sender: ALICE });
  });

  it("decodes an empty greeting", () => {
    expect(decodeGreeting(encodeGreeting("", ALICE))).toEqual({ text: "", sender: ALICE });
  });

  it("rejects truncated payloads", () => {
    expect(() => decodeGreeting("0x1234")).toThrow(DecodeError);
    expect(() => decodeGreeting("0x")).toThrow(DecodeError);
  });

  it("rejects an address word with non-zero upper bytes", () => {
    const payload = withDirtyAddress(encodeGreeting("hi", ALICE));
    expect(payload.slice(66, 130)).toBe("ff" + "0".repeat(22) + "2".repeat(40));
    expect(() => decodeGreeting(payload)).toThrow(DecodeError);
    expect(() => decodeGreeting(payload)).toThrow("payload is not a (string, address) tuple");
  });

  it("rejects text that is not valid UTF-8", () => {
    const payload = withBadUtf8(encodeGreeting("hi", ALICE));
    expect(payload.slice(194, 198)).toBe("fffe");
    expect(() => decodeGreeting(payload)).toThrow(DecodeError);
  });

  it("keeps the codec failure as the cause", () => {
    let failure: unknown;
    try {
      decodeGreeting(withBadUtf8(encodeGreeting("hi", ALICE)));
    } catch (err) {
      failure = err;
    }

    expect(failure).toBeInstanceOf(DecodeError);
    expect(failure).toMatchObject({ cause: expect.any(Error) });
  });

  it("rejects input that is not a byte string", () => {
    expect(() => decodeGreeting("hello")).toThrow(DecodeError);
    expect(() => decodeGreeting("hello")).toThrow("payload is not a byte string");
  });
});
