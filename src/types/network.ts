/**
 * Network Activity Types
 */

export interface NetworkRequestEvent {
  kind: 'request';
  /** Correlation id assigned by the recorder */
  id: string;
  timestamp: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  resourceType: string;
}

export interface NetworkResponseEvent {
  kind: 'response';
  /** Id of the request this answers, when the source could correlate it */
  requestId?: string;
  timestamp: string;
  url: string;
  /** 0 for transport failures */
  status: number;
  headers: Record<string, string>;
  ok: boolean;
  errorText?: string;
}

export type NetworkEvent = NetworkRequestEvent | NetworkResponseEvent;

export type RequestEventInput = Omit<NetworkRequestEvent, 'kind' | 'id' | 'timestamp'> & {
  timestamp?: string;
};

export type ResponseEventInput = Omit<NetworkResponseEvent, 'kind' | 'ok' | 'timestamp'> & {
  timestamp?: string;
};

export interface NetworkSummary {
  totalRequests: number;
  totalResponses: number;
  /** Responses with status >= 400 plus transport failures */
  failedResponses: number;
  /** Events evicted by the buffer cap since the last clear */
  droppedEvents: number;
  requests: NetworkRequestEvent[];
  responses: NetworkResponseEvent[];
}
