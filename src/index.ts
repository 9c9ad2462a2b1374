// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

export { HelloRelay } from "./HelloRelay.js";
export type { HelloRelayOptions } from "./HelloRelay.js";
export { encodeGreeting, decodeGreeting } from "./codec/PayloadCodec.js";
export { ServiceQuote } from "./services/ServiceQuote.js";
export { ServiceSend } from "./services/ServiceSend.js";
export type { ISendReceipt } from "./services/ServiceSend.js";
export { ServiceReceive } from "./services/ServiceReceive.js";
export { MemoryGreetingStore, EMPTY_GREETING } from "./state/MemoryGreetingStore.js";
export { SeenDeliveries } from "./state/SeenDeliveries.js";
export { RelayerAuthorizer } from "./auth/RelayerAuthorizer.js";
export { default as DriverBase } from "./drivers/DriverBase.js";
export { default as DriverEVM } from "./drivers/DriverEVM.js";
export { default as DriverLocal } from "./drivers/DriverLocal.js";
export { LocalRelayNetwork } from "./drivers/LocalRelayNetwork.js";
export type { FailedDelivery } from "./drivers/LocalRelayNetwork.js";
export { default as DataStreamServer, matchesFilters } from "./DataStreamServer.js";
export type { GreetingFilter } from "./DataStreamServer.js";
export { DataStreamClient, parseGreetingFrame } from "./DataStreamClient.js";
export { loadConfig } from "./config.js";
export { GAS_LIMIT, RECEIVER_VALUE, MAX_DOMAIN_ID } from "./constants.js";
export * from "./errors.js";
export { logDebug } from "./utils/logDebug.js";
export { logTraffic } from "./utils/logTraffic.js";
export type { DomainId, IGreeting, ILatestGreeting, IGreetingReceived, IDelivery } from "./types/IGreeting.js";
export type { IRelayService, IDeliveryQuote, IDispatchRequest, IDispatchResult, IDeliveryEndpoint } from "./types/IRelayService.js";
export type { IGreetingStore } from "./types/IGreetingStore.js";
export type { IDeliveryAuthorizer } from "./types/IDeliveryAuthorizer.js";
export type { IHelloRelay, GreetingListener } from "./types/IHelloRelay.js";
export type { IRelayEvent, RelayEventType } from "./types/IRelayEvent.js";
export type { NetworkConfig, RelayConfig } from "./types/IChainConfig.js";
