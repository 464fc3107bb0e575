export { ConsoleLoggingAdapter, SilentLoggingAdapter } from "./console-logging.adapter.js";
export type { ConsoleLoggingAdapterOptions } from "./console-logging.adapter.js";
