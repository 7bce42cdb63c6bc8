/**
 * @module typebridge/core/server
 */

export * as Server from "./Server.js"
export * as WebHandler from "./WebHandler.js"
export type { WebHandlerConfig } from "./WebHandler.js"
export * as Devtools from "./Devtools.js"
export type { DevtoolsOptions, InfoResponse, StatusResponse } from "./Devtools.js"
