import type { Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import type { SessionStore } from "../lib/session-store";
import type { SessionRequest, SessionTokenPayload } from "../lib/session-types";

export interface SessionAuth {
  requireSession(req: SessionRequest, res: Response, next: NextFunction): void;
  signToken(sessionId: string): string;
}

// Idle expiry is enforced by the store; the token only bounds how long an id is accepted
const TOKEN_LIFETIME = "1d";

export function createSessionAuth(store: SessionStore, secret: string): SessionAuth {
  return {
    requireSession(req, res, next) {
      const header = req.headers.authorization;

      if (!header?.startsWith("Bearer ")) {
        res.status(401).json({ error: "Missing or invalid authorization header" });
        return;
      }

      const token = header.slice(7);

      let sid: string;
      try {
        const payload = jwt.verify(token, secret);
        if (typeof payload === "string" || typeof payload.sid !== "string") {
          res.status(401).json({ error: "Invalid session token" });
          return;
        }
        sid = payload.sid;
      } catch {
        res.status(401).json({ error: "Invalid or expired token" });
        return;
      }

      if (!store.touch(sid)) {
        res.status(401).json({ error: "Session ended or expired" });
        return;
      }

      req.sessionId = sid;
      next();
    },

    signToken(sessionId) {
      const payload: SessionTokenPayload = { sid: sessionId };
      return jwt.sign(payload, secret, { expiresIn: TOKEN_LIFETIME });
    },
  };
}
