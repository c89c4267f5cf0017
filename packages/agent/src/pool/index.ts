export { FailureSignal, type FailureListener } from "./failure-signal.js";
export { createHandlerCatalog, type HandlerCatalogDefinition } from "./handler-catalog.js";
export { PoolSupervisor, type PoolSupervisorOptions } from "./pool-supervisor.js";
export { WorkerPoolImpl, type WorkerPoolOptions } from "./worker-pool.js";
