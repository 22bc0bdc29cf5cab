import type { Request } from "express";

export interface SessionTokenPayload {
  sid: string;
}

export interface SessionRequest extends Request {
  sessionId?: string;
}
