export interface StatusResponse {
  status: string;
}

export interface HealthResponse extends StatusResponse {
  timestamp: string;
}

/**
 * Envelope every JSON response is wrapped in.
 */
export interface ApiResponse<T> {
  statusCode: number;
  message: string;
  data: T;
}
