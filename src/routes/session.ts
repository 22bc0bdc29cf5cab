import { Router } from "express";
import type { SessionStore } from "../lib/session-store";
import type { SessionRequest } from "../lib/session-types";
import type { SessionAuth } from "../middleware/session";

export function createSessionRouter(store: SessionStore, auth: SessionAuth): Router {
  const router = Router();

  // POST /api/session
  router.post("/", (_req, res) => {
    const sessionId = store.create();
    console.log(`[session] started ${sessionId} (${store.size} active)`);
    res.status(201).json({ token: auth.signToken(sessionId), sessionId });
  });

  // DELETE /api/session
  router.delete("/", auth.requireSession, (req: SessionRequest, res) => {
    if (req.sessionId) {
      store.end(req.sessionId);
      console.log(`[session] ended ${req.sessionId}`);
    }
    res.status(204).end();
  });

  return router;
}
