export interface APIError {
  status: 'error';
  message: string;
  code?: string;
  timestamp: string;
  endpoint?: string;
  requestId?: string;
}

export interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  uptime: number;
  version: string;
  timestamp: string;
}

// API Response wrapper
export interface ApiResponse<T> {
  status: 'success' | 'error';
  data: T;
  message?: string;
  timestamp: string;
}
