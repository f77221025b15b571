/**
 * Image Upload Service
 * Posts survey photographs to an ImgBB-compatible image host and returns the public view URL
 */

import axios, { AxiosInstance } from 'axios';
import { ImageHostConfig } from '../config';
import { errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('ImageUploadService');

export interface ImageUploader {
  readonly enabled: boolean;
  upload(image: Buffer, filename?: string): Promise<string | null>;
}

interface ImgbbUploadResponse {
  success?: boolean;
  data?: {
    display_url?: string;
    url?: string;
  };
}

function isUploadResponse(body: unknown): body is ImgbbUploadResponse {
  return typeof body === 'object' && body !== null;
}

export type HttpPoster = Pick<AxiosInstance, 'post'>;

export class ImgbbUploadService implements ImageUploader {
  private readonly httpClient: HttpPoster;

  constructor(private readonly config: ImageHostConfig, httpClient?: HttpPoster) {
    this.httpClient = httpClient ?? axios.create({
      timeout: config.timeoutMs,
      validateStatus: () => true
    });
  }

  get enabled(): boolean {
    return this.config.apiKey.length > 0;
  }

  /**
   * Upload the image and return its direct view URL, or null when the host rejects it.
   */
  async upload(image: Buffer, filename?: string): Promise<string | null> {
    if (!this.enabled) {
      logger.warn('Image upload skipped, no image host API key configured');
      return null;
    }

    const form = new URLSearchParams();
    form.set('key', this.config.apiKey);
    form.set('image', image.toString('base64'));
    if (filename) {
      form.set('name', filename.replace(/\.[^.]+$/, ''));
    }

    const startTime = Date.now();

    try {
      const response = await this.httpClient.post<unknown>(this.config.uploadUrl, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
      });

      const body = response.data;
      const displayUrl = isUploadResponse(body) && body.success ? body.data?.display_url : undefined;

      if (response.status === 200 && displayUrl) {
        logger.info('Image uploaded', {
          size: image.length,
          duration: Date.now() - startTime
        });
        return displayUrl;
      }

      logger.error('Image upload failed', {
        status: response.status,
        response: (typeof body === 'string' ? body : JSON.stringify(body ?? null)).substring(0, 500)
      });
      return null;
    } catch (error) {
      logger.error('Error uploading image', {
        error: errorMessage(error),
        duration: Date.now() - startTime
      });
      return null;
    }
  }
}
