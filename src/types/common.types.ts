export interface ServiceResponse<T> {
  success: true;
  data: T;
  timestamp: string;
  message?: string;
}

export interface ServiceErrorResponse {
  success: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    detail?: string;
  };
  timestamp: string;
}

export interface DataSummary {
  customers: number;
  transactions: number;
  events: number;
  products: number;
}

export type ComponentStatus = 'connected' | 'disconnected' | 'not_configured';
