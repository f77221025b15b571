import { CellValue, LocationMethod, SubmissionColumn, SubmissionWarning } from './survey';

export interface ApiError {
  error: {
    code: string;
    message: string;
    field?: string;
    details?: Record<string, unknown>;
    requestId: string;
  };
}

export interface SubmissionResponse {
  success: true;
  data: {
    record: Record<string, CellValue>;
    row: CellValue[];
    location: {
      method: LocationMethod;
      coordinate: { latitude: number; longitude: number } | null;
      accuracy?: number;
    };
    imageUrl: string | null;
    warnings: SubmissionWarning[];
  };
  meta: {
    requestId: string;
    responseTime: number;
    timestamp: string;
  };
}

export interface FormOptionsResponse {
  roadTypes: readonly string[];
  distressTypes: readonly string[];
  severityLevels: readonly string[];
  locationMethods: readonly LocationMethod[];
  columns: readonly SubmissionColumn[];
  requiredColumns: readonly SubmissionColumn[];
}

export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  responseTime: string;
  services: {
    database: {
      healthy: boolean;
      latency: number;
      error?: string;
    };
    imageHost: {
      enabled: boolean;
    };
  };
}
