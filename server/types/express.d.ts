import type { AuthenticatedUser } from "../auth/authenticate";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthenticatedUser;
    }
  }
}

export {};
