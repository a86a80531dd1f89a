import express from "express";
import helmet from "helmet";
import cors from "cors";
import { router } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler.js";

/**
 * Express application instance.
 * Configures global middleware and routes.
 */
export const app = express();

/** Disable the X-Powered-By header to reduce fingerprinting. */
app.disable("x-powered-by");

/** Adds standard security headers. */
app.use(helmet());
/** Enables CORS so a separate front-end can poll and stream status. */
app.use(cors());
/** Parses JSON request bodies. */
app.use(express.json({ limit: "16kb" }));

/** Rate limiting for all routes. */
app.use(apiLimiter);

/** Application routes. */
app.use(router);

/** Unmatched routes become 404s. */
app.use(notFoundHandler);

/** Global error handler - MUST be last. */
app.use(errorHandler);
