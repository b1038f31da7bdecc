import cors, { CorsOptions } from "cors";
import { Express } from "express";
import { getServiceConfig } from "../lib/service-config";

/**
 * Requests without an Origin header (curl, server-to-server) are always allowed;
 * browser origins must be on CORS_ALLOWED_ORIGINS.
 */
export function buildCorsOptions(allowedOrigins: string[]): CorsOptions {
  return {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error("Not allowed by CORS"));
      }
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Authorization", "Content-Type"],
    credentials: false,
    maxAge: 86400,
  };
}

export function setupCors(app: Express) {
  const corsOptions = buildCorsOptions(getServiceConfig().corsAllowedOrigins);
  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));
}
