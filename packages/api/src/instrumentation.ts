import { Langfuse } from 'langfuse';

import { createLogger, errorMessage } from '@rights-parser/shared';

const log = createLogger('instrumentation');

// Check if Langfuse is configured
const langfusePublicKey = process.env['LANGFUSE_PUBLIC_KEY'];
const langfuseSecretKey = process.env['LANGFUSE_SECRET_KEY'];
const langfuseHost = process.env['LANGFUSE_HOST']; // Optional, defaults to cloud.langfuse.com

let langfuse: Langfuse | null = null;

// Only initialize if Langfuse credentials are provided
if (langfusePublicKey && langfuseSecretKey) {
  langfuse = new Langfuse({
    publicKey: langfusePublicKey,
    secretKey: langfuseSecretKey,
    // Only pass baseUrl when set; Langfuse defaults to cloud otherwise
    ...(langfuseHost ? { baseUrl: langfuseHost } : {}),
    flushAt: 10,
    flushInterval: 1000,
    requestTimeout: 5000
  });
} else {
  log.debug('Langfuse tracing not initialized: LANGFUSE_PUBLIC_KEY or LANGFUSE_SECRET_KEY not set');
}

export { langfuse };

/**
 * Flush pending traces. Called from the shutdown path.
 */
export async function flushSpans(): Promise<void> {
  if (langfuse) {
    try {
      await langfuse.flushAsync();
    } catch (error) {
      log.error('Failed to flush spans to Langfuse', { error: errorMessage(error) });
    }
  }
}

export async function shutdown(): Promise<void> {
  if (langfuse) {
    await langfuse.shutdownAsync();
  }
}
