import rateLimit from "express-rate-limit";

export function makeRateLimiter(args: { windowMs: number; max: number }) {
  return rateLimit({
    windowMs: args.windowMs,
    limit: args.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { ok: false, error: "rate_limited" }
  });
}
