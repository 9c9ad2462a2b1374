import { describe, it, expect } from "vitest";
import { ServiceQuote } from "../../src/services/ServiceQuote.js";
import { UpstreamError } from "../../src/errors.js";
import { FakeRelayService } from "../helpers/fixtures.js";

describe("ServiceQuote", () => {
  it("asks for the fixed execution budget with no receiver value", async () => {
    const relay = new FakeRelayService(1234);
    const quoter = new ServiceQuote(relay);

    const cost = await quoter.quote(5);

    expect(cost.toString()).toBe("1234");
    expect(relay.quotes).toEqual([{ targetDomain: 5, receiverValue: "0", gasLimit: "50000" }]);
  });

  it("re-quotes on every call", async () => {
    const relay = new FakeRelayService(100);
    const quoter = new ServiceQuote(relay);

    expect((await quoter.quote(5)).toString()).toBe("100");
    relay.cost = relay.cost.mul(3);
    expect((await quoter.quote(5)).toString()).toBe("300");
    expect(relay.quotes).toHaveLength(2);
  });

  it("surfaces relay failures as UpstreamError keeping the original", async () => {
    const relay = new FakeRelayService();
    const original = new Error("unsupported target chain");
    relay.quoteError = original;

    const failure = await new ServiceQuote(relay).quote(99).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(UpstreamError);
    expect(failure).toMatchObject({ message: "unsupported target chain", cause: original });
  });
});
