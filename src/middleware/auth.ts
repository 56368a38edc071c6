import type { Request, Response, NextFunction } from "express";
import * as jose from "jose";
import { SubscriptionRejectedError } from "../services/errors.js";
import { logger } from "./logging.js";

declare global {
  namespace Express {
    interface Request {
      /** Subject of the verified subscriber token */
      subscriberSub?: string;
    }
  }
}

export interface TokenGuardOptions {
  secret: string;
  issuer?: string;
  audience?: string;
}

/**
 * Build a pre-subscription hook that verifies an HS256 access token.
 *
 * EventSource can't set custom headers, so the JWT travels as the `token`
 * query parameter.
 */
export function createTokenGuard(options: TokenGuardOptions) {
  if (!options.secret) {
    throw new Error("Token guard requires a non-empty secret");
  }
  const secret = new TextEncoder().encode(options.secret);

  return async function verifySubscriber(req: Request): Promise<void> {
    const token = typeof req.query.token === "string" ? req.query.token : undefined;
    if (!token) {
      throw new SubscriptionRejectedError(401, "UNAUTHORIZED", "token query parameter required");
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, secret, {
        issuer: options.issuer,
        audience: options.audience,
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        logger.warn("Subscriber token expired", { requestId: req.requestId });
      } else {
        logger.warn("Subscriber token verification failed", { requestId: req.requestId });
      }
      throw new SubscriptionRejectedError(401, "INVALID_TOKEN", "Token verification failed");
    }

    if (!payload.sub) {
      throw new SubscriptionRejectedError(401, "INVALID_TOKEN", "Token must contain sub claim");
    }
    if (payload.type !== undefined && payload.type !== "access") {
      throw new SubscriptionRejectedError(401, "INVALID_TOKEN", "Access token required");
    }

    req.subscriberSub = payload.sub;
  };
}

/**
 * Require `Authorization: Bearer <publishToken>` on publish endpoints.
 * An empty token disables publishing over HTTP.
 */
export function requirePublishToken(publishToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!publishToken) {
      res.status(403).json({
        error: { code: "PUBLISH_DISABLED", message: "Publishing over HTTP is not configured" },
      });
      return;
    }

    if (req.headers.authorization !== `Bearer ${publishToken}`) {
      res.status(401).json({
        error: { code: "AUTHENTICATION_REQUIRED", message: "Valid publish token required" },
      });
      return;
    }

    next();
  };
}
