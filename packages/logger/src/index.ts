export { createJsonLogger, createLogger, type AppLogObj, type LogMode } from "./logger";
export { Logger } from "tslog";
