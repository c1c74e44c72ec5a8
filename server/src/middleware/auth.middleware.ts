import { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";

/**
 * Resolves the bearer token to an owner and stores it on `res.locals.owner`.
 * `apiKeys` maps key -> owner.
 */
export function createAuthMiddleware(
  apiKeys: ReadonlyMap<string, string>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      logger.warn(
        "Authentication failed: missing or invalid authorization header",
      );
      res.status(401).json({
        error: "Unauthorized: missing or invalid authorization header",
      });
      return;
    }

    const token = authHeader.substring(7); // Remove 'Bearer ' prefix
    const owner = apiKeys.get(token);

    if (!owner) {
      logger.warn("Authentication failed: invalid API key");
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    res.locals.owner = owner;
    next();
  };
}

export function getOwner(res: Response): string {
  const owner: unknown = res.locals.owner;
  if (typeof owner !== "string") {
    throw new Error("Request reached an owner-scoped route unauthenticated");
  }
  return owner;
}
