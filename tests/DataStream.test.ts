import { describe, it, expect, vi } from "vitest";
import DataStreamServer, { matchesFilters } from "../src/DataStreamServer.js";
import { HelloRelay } from "../src/HelloRelay.js";
import { encodeGreeting } from "../src/codec/PayloadCodec.js";
import { parseGreetingFrame } from "../src/DataStreamClient.js";
import type { IGreetingReceived } from "../src/types/IGreeting.js";
import { ALICE, BOB, RELAYER, FakeRelayService, hashOf } from "./helpers/fixtures.js";

const greeting: IGreetingReceived = { text: "hello", sourceDomain: 5, sender: ALICE, deliveryHash: hashOf("g") };

describe("matchesFilters", () => {
  it("passes everything without filters", () => {
    expect(matchesFilters(greeting, {})).toBe(true);
  });

  it("filters on source domain", () => {
    expect(matchesFilters(greeting, { sourceDomain: 5 })).toBe(true);
    expect(matchesFilters(greeting, { sourceDomain: 6 })).toBe(false);
  });

  it("filters on sender regardless of case", () => {
    const mixed: IGreetingReceived = { ...greeting, sender: "0xAbCdEfabcdefabcdefabcdefabcdefabcdefabcd" };
    expect(matchesFilters(mixed, { sender: "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd" })).toBe(true);
    expect(matchesFilters(greeting, { sender: BOB })).toBe(false);
  });

  it("requires every filter to match", () => {
    expect(matchesFilters(greeting, { sourceDomain: 5, sender: BOB })).toBe(false);
  });
});

describe("parseGreetingFrame", () => {
  it("reads frames produced by the server", () => {
    expect(parseGreetingFrame(JSON.stringify({ greeting }))).toEqual(greeting);
  });

  it("ignores frames without a greeting", () => {
    expect(parseGreetingFrame(JSON.stringify({ data: 1 }))).toBeUndefined();
    expect(parseGreetingFrame(JSON.stringify({ greeting: { text: "no sender" } }))).toBeUndefined();
    expect(parseGreetingFrame("null")).toBeUndefined();
  });

  it("throws on invalid JSON", () => {
    expect(() => parseGreetingFrame("{")).toThrow(SyntaxError);
  });
});

describe("DataStreamServer", () => {
  it("streams greetings applied by an attached relay until stopped", async () => {
    const relay = new HelloRelay({ relayService: new FakeRelayService(), relayerAddress: RELAYER, senderAddress: BOB, traffic: () => undefined });
    const server = new DataStreamServer(0, { sourceDomain: 5 });
    const sendData = vi.spyOn(server, "sendData");
    server.attach(relay);

    const delivery = { payload: encodeGreeting("streamed", ALICE), additionalMessages: [], sourceAddress: ALICE, sourceDomain: 5, deliveryHash: hashOf("s") };
    relay.onDeliver(RELAYER, delivery);

    expect(sendData).toHaveBeenCalledWith({ text: "streamed", sourceDomain: 5, sender: ALICE, deliveryHash: hashOf("s") });

    await server.stop();
    relay.onDeliver(RELAYER, delivery);
    expect(sendData).toHaveBeenCalledTimes(1);
  });
});
