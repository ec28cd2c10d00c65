import pino from "pino";
import { LOG_LEVEL } from "./config";

export const logger = pino({
    name: "bond-valuation",
    level: LOG_LEVEL,
});

export default logger;
