import { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Extract API key from request
 * Looks in: X-API-Key header, then Authorization Bearer
 */
export function extractApiKey(req: Pick<Request, "headers">): string | null {
  const headerKey = req.headers["x-api-key"];
  if (typeof headerKey === "string" && headerKey) {
    return headerKey;
  }

  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }

  return null;
}

/**
 * Middleware guarding pipeline triggers
 * With no key configured (dev mode) every request passes
 */
export function requireRunApiKey(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedKey) {
      console.log(`[runAuth] RUN_API_KEY not configured, allowing request`);
      return next();
    }

    const apiKey = extractApiKey(req);

    if (!apiKey) {
      return res.status(401).json({
        error: "Missing API key. Provide via X-API-Key header or Authorization Bearer"
      });
    }

    if (apiKey !== expectedKey) {
      return res.status(401).json({ error: "Invalid API key" });
    }

    next();
  };
}
