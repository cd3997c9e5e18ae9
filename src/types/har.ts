/**
 * HAR (HTTP Archive) Trace Types
 *
 * The subset of HAR 1.2 the recorder exports: enough for HAR viewers and
 * trace-analysis tooling to replay the request/response sequence.
 * HAR 1.2 specification: http://www.softwareishard.com/blog/har-12-spec/
 */

/**
 * Creator info
 */
export interface HarCreator {
  name: string;
  version: string;
  comment?: string;
}

/**
 * Header info
 */
export interface HarHeader {
  name: string;
  value: string;
}

/**
 * Request info
 */
export interface HarRequest {
  method: string;
  url: string;
  headers: HarHeader[];
}

/**
 * Response info
 */
export interface HarResponse {
  status: number;
  headers: HarHeader[];
}

/**
 * A single request/response pair
 */
export interface HarEntry {
  startedDateTime: string;
  request: HarRequest;
  response: HarResponse;
  comment?: string;
}

export interface HarLog {
  version: string;
  creator: HarCreator;
  entries: HarEntry[];
}

export interface Har {
  log: HarLog;
}
