export { checkIpWorkflow, type CheckedIp } from "./check-ip.js";
export { commissionWorkflow, deployWorkflow, deployedOsWorkflow, ephemeralOsWorkflow } from "./boot.js";
export { createDefaultHandlerCatalog } from "./default-catalog.js";
export { powerCycleWorkflow, powerOffWorkflow, powerOnWorkflow, powerQueryWorkflow } from "./power.js";
