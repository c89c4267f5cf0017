export { ControllerClientImpl, dialController } from "./controller-client.js";
export { ResilientConnector, type ConnectorOptions } from "./connector.js";
