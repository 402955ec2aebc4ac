import type { NextFunction, Request, Response } from 'express';

const toMegabytes = (bytes: number) => (bytes / 1024 / 1024).toFixed(2);

/** Logs resident memory before each request and once its response has finished. */
export function logMemoryUsage(req: Request, res: Response, next: NextFunction): void {
  const before = process.memoryUsage().rss;
  console.log(`Memory before ${req.method} ${req.path}: ${toMegabytes(before)} MB`);

  res.on('finish', () => {
    const after = process.memoryUsage().rss;
    console.log(`Memory after request: ${toMegabytes(after)} MB`);
    console.log(`Memory used during request: ${toMegabytes(after - before)} MB`);
  });

  next();
}
