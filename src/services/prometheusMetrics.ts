/**
 * Prometheus Metrics Service
 * HTTP and submission metrics exported on /metrics
 */

import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('PrometheusMetrics');

export type SubmissionOutcome = 'accepted' | 'rejected' | 'storage_failure';

export type UploadOutcome = 'uploaded' | 'failed' | 'skipped';

export interface MetricsOptions {
  collectDefaults?: boolean;
}

export class PrometheusMetricsService {
  readonly registry: Registry;

  private httpRequestsTotal: Counter<string>;
  private httpRequestDuration: Histogram<string>;
  private submissionsTotal: Counter<string>;
  private locationResolutionTotal: Counter<string>;
  private imageUploadsTotal: Counter<string>;

  constructor(options: MetricsOptions = {}) {
    this.registry = new Registry();

    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({
        register: this.registry,
        prefix: 'survey_service_',
        labels: {
          service: 'road-distress-survey-service',
          version: process.env.npm_package_version || '1.0.0'
        }
      });
    }

    this.httpRequestsTotal = new Counter({
      name: 'survey_http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'],
      registers: [this.registry]
    });

    this.httpRequestDuration = new Histogram({
      name: 'survey_http_request_duration_seconds',
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 15],
      registers: [this.registry]
    });

    this.submissionsTotal = new Counter({
      name: 'survey_submissions_total',
      help: 'Total number of road distress submissions by outcome',
      labelNames: ['outcome'],
      registers: [this.registry]
    });

    this.locationResolutionTotal = new Counter({
      name: 'survey_location_resolution_total',
      help: 'Location resolutions by method and whether a coordinate was obtained',
      labelNames: ['method', 'resolved'],
      registers: [this.registry]
    });

    this.imageUploadsTotal = new Counter({
      name: 'survey_image_uploads_total',
      help: 'Image host uploads by outcome',
      labelNames: ['outcome'],
      registers: [this.registry]
    });

    logger.debug('Prometheus metrics service initialized');
  }

  recordHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    const labels = { method, route, status_code: String(statusCode) };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationMs / 1000);
  }

  recordSubmission(outcome: SubmissionOutcome): void {
    this.submissionsTotal.inc({ outcome });
  }

  recordLocationResolution(method: string, resolved: boolean): void {
    this.locationResolutionTotal.inc({ method, resolved: String(resolved) });
  }

  recordImageUpload(outcome: UploadOutcome): void {
    this.imageUploadsTotal.inc({ outcome });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
