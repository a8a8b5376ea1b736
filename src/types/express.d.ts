declare global {
  namespace Express {
    interface Request {
      /** Unparsed request body, kept for webhook signature checks. */
      rawBody?: Buffer;
    }
  }
}

export {};
