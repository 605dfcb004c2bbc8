/**
 * Global Type Declarations
 * Request and session augmentations for the API server
 */

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      clientIp?: string;
    }
  }
}

declare module 'express-session' {
  interface SessionData {
    userId?: string;
  }
}

export {};
