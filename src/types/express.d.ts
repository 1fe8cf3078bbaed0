import type { Principal } from "../modules/auth/session.types.js";

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
      auth?: {
        username: string;
        sessionId: string;
      };
    }
  }
}
