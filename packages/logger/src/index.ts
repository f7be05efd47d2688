export * from "./interface.js";
export {WinstonLogger, type LoggerWithChild} from "./winston.js";
export {getNodeLogger, WinstonLoggerNode, type LoggerNode, type LoggerNodeOpts} from "./node.js";
export {getEnvLogLevel, getEnvLogger} from "./env.js";
export {getEmptyLogger} from "./empty.js";
export {logCtxToJson, logCtxToString, type Json} from "./utils/json.js";
