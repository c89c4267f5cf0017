export { SHUTDOWN_SIGNALS, waitForShutdown, type ShutdownOutcome } from "./wait-for-shutdown.js";
