import type { RouteRequest, RouteResponse } from '../types/domain';

export class FakeRequest implements RouteRequest {
  constructor(public method: string, public url: string) {}
}

export class FakeResponse implements RouteResponse {
  statusCode = 200;
  headersSent = false;
  finished = false;
  headers: Record<string, string> = {};
  body = '';
  // Error handed to write callbacks, to simulate a dropped connection
  writeError: Error | null = null;

  setHeader(name: string, value: string | number | readonly string[]) {
    this.headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    return this;
  }

  write(chunk: string, callback?: (error: Error | null | undefined) => void) {
    this.headersSent = true;
    if (!this.writeError) this.body += chunk;
    callback?.(this.writeError);
    return this.writeError === null;
  }

  end(chunk?: string) {
    if (chunk !== undefined) this.body += chunk;
    this.headersSent = true;
    this.finished = true;
    return this;
  }

  json(): unknown {
    return JSON.parse(this.body);
  }
}
