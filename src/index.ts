export type { EventRecord, JsonObject, JsonValue } from "./events/types.ts";
export { EventStore } from "./events/store.ts";
export { parseBatch, extractName, UNKNOWN_EVENT_NAME } from "./events/ingest.ts";
export type { EventFilter, NameMatchMode } from "./filter.ts";
export { compileFilter, describeFilter } from "./filter.ts";
export { matchJson, findKeyValue, containsData } from "./json/match.ts";
export { CollectorServer } from "./collector/server.ts";
export type { CollectorOptions } from "./collector/server.ts";
export { createProxyServer } from "./proxy/httpProxy.ts";
export type { ProxyAddon, RequestFlow, RequestHead } from "./proxy/addon.ts";
export { MirrorAddon } from "./proxy/mirror.ts";
export { matchesTarget } from "./proxy/target.ts";
export { ProxySupervisor } from "./proxy/supervisor.ts";
export type { ProxyHandle, SupervisorOptions } from "./proxy/supervisor.ts";
export { EventVerifier } from "./verifier/verifier.ts";
export type { WaitOptions, CorrelateOptions, RetryOptions } from "./verifier/verifier.ts";
export { CollectorEventSource, HttpEventSource } from "./verifier/source.ts";
export type { EventSource } from "./verifier/source.ts";
export { SoftAssert } from "./verifier/soft.ts";
export { SetupError, EventTimeoutError, EventAssertionError, WaitCancelledError } from "./errors.ts";
export type { CollectorConfig, MirrorConfig, ProxyConfig, TargetSpec } from "./config.ts";
export { loadCollectorConfig, loadMirrorConfig, loadProxyConfig } from "./config.ts";
export { createLogger } from "./logger.ts";
export type { Logger } from "./logger.ts";
