import type { RequestHandler } from 'express';
import { randomUUID } from 'crypto';

const HEADER = 'x-request-id';

export const requestId: RequestHandler = (req, res, next) => {
  const incoming = req.header(HEADER);
  req.id ||= incoming && incoming.length <= 128 ? incoming : randomUUID();
  res.setHeader(HEADER, String(req.id));
  next();
};
