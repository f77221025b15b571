import { SubmissionRequest } from '../services/submissionWorkflow';

declare global {
  namespace Express {
    interface Request {
      startTime?: number;
      requestId?: string;
      correlationId?: string;
      clientId?: string;
      submission?: SubmissionRequest;
    }
  }
}

export {};
