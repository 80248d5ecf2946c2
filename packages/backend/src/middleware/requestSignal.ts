import type { Request, Response } from "express";

/**
 * Returns a signal that aborts when the client goes away before the
 * response has been written.
 */
export function abortOnDisconnect(req: Request, res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error(`Client disconnected: ${req.method} ${req.originalUrl}`));
    }
  });
  return controller.signal;
}
