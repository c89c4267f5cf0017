export { CommandPowerDriver, type ExecFile } from "./command-power-driver.js";
