/** Base for errors caused by configuration or user input rather than the environment. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ConfigFileInvalidError extends ConfigError {
  constructor(filePath: string, message: string) {
    super(`Config file ${filePath} is invalid: ${message}`);
    this.name = "ConfigFileInvalidError";
  }
}

export class ConfigFileNotFoundError extends ConfigError {
  constructor(filePath: string) {
    super(`Config file ${filePath} does not exist.`);
    this.name = "ConfigFileNotFoundError";
  }
}

export class ConfigInvalidUrlError extends ConfigError {
  constructor(value: string) {
    super(
      `Invalid base URL "${value}". Set DX_REFRESH_BASE_URL or baseUrl in dx-refresh.config.json to an http(s) URL.`
    );
    this.name = "ConfigInvalidUrlError";
  }
}

export class ConfigInvalidScheduleError extends ConfigError {
  constructor(value: string) {
    super(`Invalid cron schedule "${value}". Expected five fields, e.g. "30 9 * * *".`);
    this.name = "ConfigInvalidScheduleError";
  }
}

export class ConfigInvalidTimeoutError extends ConfigError {
  constructor(value: string) {
    super(`Invalid timeout "${value}". Expected a positive number of seconds, at most 2147483.`);
    this.name = "ConfigInvalidTimeoutError";
  }
}

export class ConfigMissingTokenError extends ConfigError {
  constructor() {
    super("Authorization header value must not be empty.");
    this.name = "ConfigMissingTokenError";
  }
}

export class ConfigUnsafeTokenError extends ConfigError {
  constructor() {
    super(
      'Authorization header value contains characters that cannot be embedded in a cron line (", \\, $, `, %, or a line break).'
    );
    this.name = "ConfigUnsafeTokenError";
  }
}

export class ConfigInvalidPageError extends ConfigError {
  constructor(field: string, value: number) {
    super(`Invalid ${field} "${value}". Expected a positive whole number.`);
    this.name = "ConfigInvalidPageError";
  }
}

export class ConfigMissingDatasetError extends ConfigError {
  constructor() {
    super("Dataset name must not be empty.");
    this.name = "ConfigMissingDatasetError";
  }
}
