import { configureLogging } from "@setu/core";

// Library loggers stay silent under test; LOG_LEVEL still raises the level
// for loggers that are given their own transports.
configureLogging({ transports: [] });
