/**
 * NDJSON streaming to HTTP clients.
 *
 * Writes each relay record as one `{json}\n` line, honours backpressure and
 * cancels the relay when the client goes away.
 */

import { once } from "events";

import { NDJSON_CONTENT_TYPE, SHIM_HEADERS } from "../../constants/endpoints.js";
import { logger } from "../../logging/index.js";

import type { StreamRelay } from "../../translation/stream/StreamRelay.js";
import type { OllamaStreamChunk } from "../../types/index.js";
import type { Response } from "express";

export function formatNdjsonLine(data: unknown): string {
  return JSON.stringify(data) + "\n";
}

export function setNdjsonHeaders(res: Response, correlationId: string): void {
  res.status(200);
  res.setHeader("Content-Type", NDJSON_CONTENT_TYPE);
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader(SHIM_HEADERS.CORRELATION_ID, correlationId);
  res.flushHeaders();
}

async function waitForDrain(res: Response): Promise<void> {
  const controller = new AbortController();
  try {
    await Promise.race([
      once(res, "drain", { signal: controller.signal }),
      once(res, "close", { signal: controller.signal }),
    ]);
  } finally {
    controller.abort();
  }
}

/**
 * Drain a relay into the response. Resolves once the final record is written
 * or the client disconnected; the relay never throws for upstream failures.
 */
export async function pipeRelayToResponse<TChunk extends OllamaStreamChunk>(
  relay: StreamRelay<TChunk>,
  res: Response,
  context: string,
): Promise<void> {
  let clientGone = false;
  const onClose = (): void => {
    if (res.writableFinished) {
      return;
    }
    clientGone = true;
    logger.debug(`[${context}] Client disconnected, cancelling upstream stream`);
    relay.close().catch((error: unknown) => {
      logger.warn(`[${context}] Failed to cancel upstream stream:`, error);
    });
  };
  res.on("close", onClose);

  try {
    for await (const chunk of relay) {
      if (clientGone || res.destroyed) {
        break;
      }
      const flushed = res.write(formatNdjsonLine(chunk));
      if (!flushed) {
        await waitForDrain(res);
      }
    }
  } finally {
    res.off("close", onClose);
    if (!res.writableEnded) {
      res.end();
    }
  }
}
