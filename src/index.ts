export * from "./config/defaults.js";
export * from "./config/loadConfig.js";
export * from "./cron/cronLine.js";
export * from "./cron/crontab.js";
export * from "./cron/ensureCronLine.js";
export * from "./install/runInstall.js";
export * from "./install/runStatus.js";
export * from "./services/refresh/refreshClient.js";
export * from "./report/formatters.js";
export * from "./errors/config.errors.js";
export * from "./errors/crontab.errors.js";
export * from "./errors/refresh.errors.js";
