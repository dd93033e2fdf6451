export class RefreshRequestFailedError extends Error {
  constructor(url: string, message: string) {
    super(`Request to ${url} failed: ${message}`);
    this.name = "RefreshRequestFailedError";
  }
}

export class RefreshUnauthorizedError extends Error {
  constructor(url: string) {
    super(`Request to ${url} was rejected (401). Check the Authorization header value.`);
    this.name = "RefreshUnauthorizedError";
  }
}

export class RefreshResponseError extends Error {
  status: number;
  body: string;

  constructor(url: string, status: number, body: string) {
    const detail = body ? `: ${body}` : "";
    super(`Request to ${url} returned ${status}${detail}`);
    this.name = "RefreshResponseError";
    this.status = status;
    this.body = body;
  }
}

export class UnknownDatasetError extends Error {
  constructor(name: string, known: readonly string[]) {
    super(`Unknown dataset "${name}". Known datasets: ${known.join(", ")}.`);
    this.name = "UnknownDatasetError";
  }
}
