import type { ChainState } from './modules/ledger/types/ledger.types.js';

export interface APIError {
  status: 'error';
  message: string;
  code?: string;
  timestamp: string;
  endpoint?: string;
  requestId?: string;
  details?: unknown;
}

export interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  uptime: number;
  version: string;
  timestamp: string;
  checks: {
    database: boolean;
    ledger: ChainState;
    blocks: number;
  };
}

export interface ApiResponse<T> {
  status: 'success';
  data: T;
  timestamp: string;
}
