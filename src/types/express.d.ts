// Request fields set by our middleware.

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
