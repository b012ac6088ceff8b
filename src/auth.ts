import type { NextFunction, Request, RequestHandler, Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { logger } from "./lib/logger";

/** Tokens are minted by the chat front-end that shares JWT_SECRET. */
export const jwtUserSchema = z.object({
  userId: z.string().min(1),
  username: z.string().min(1),
});

export type JwtUser = z.infer<typeof jwtUserSchema>;

export function verifyJwt(token: string, secret: string): JwtUser {
  return jwtUserSchema.parse(jwt.verify(token, secret));
}

export function bearerToken(header: string | undefined): string {
  return header?.startsWith("Bearer ") ? header.slice("Bearer ".length) : "";
}

export function createRequireAuth(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      res.status(401).json({ error: "UNAUTHORIZED" });
      return;
    }

    try {
      res.locals.user = verifyJwt(token, secret);
    } catch {
      logger.authFailure(req.ip ?? "unknown");
      res.status(401).json({ error: "UNAUTHORIZED" });
      return;
    }
    next();
  };
}

/** The user stored by requireAuth. */
export function authedUser(res: Response): JwtUser {
  return jwtUserSchema.parse(res.locals.user);
}
