export { createPowerActivity } from "./power.js";
export { createSwitchBootOrderActivity } from "./switch-boot-order.js";
export * from "./schemas.js";
