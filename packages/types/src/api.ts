export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  requestId: string;
  details?: unknown;
}

export interface SummarizeResponseData {
  fileName: string;
  fileType: string;
  summaryShort: string[];
  summaryDetailed: string;
  model: string;
  chunkCount: number;
  processingTimeSec: number;
}

export interface HealthResponse {
  server: "healthy";
  ollama: "healthy" | "unhealthy";
  ollamaUrl: string;
  model: string;
}
