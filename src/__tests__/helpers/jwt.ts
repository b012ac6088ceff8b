import jwt from "jsonwebtoken";
import type { JwtUser } from "../../auth";

/** Mints a token the way the chat front-end does. */
export function signJwt(payload: JwtUser, secret: string): string {
  return jwt.sign(payload, secret, { expiresIn: "7d" });
}
