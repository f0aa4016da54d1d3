import type { ApiKey } from '@rights-parser/database';

declare global {
  namespace Express {
    interface Request {
      /** Set by the auth gate once the presented key is known */
      apiKey?: ApiKey;
      apiKeyHash?: string;
      /** Job created or read by the request, for the usage log */
      jobId?: string;
    }
  }
}

export {};
