import type { Env } from "./config.js";
import { TEXT_CONTENT_TYPE } from "./constants.js";
import logger from "./logger.js";
import { handleFilterRequest, type FilterContext } from "./routes/filter/index.js";
import { handleHealthCheck } from "./routes/health/index.js";

const log = logger.child({ module: "router" });

function textResponse(message: string, status: number): Response {
  return new Response(message, { status, headers: { "Content-Type": TEXT_CONTENT_TYPE } });
}

function notFound(): Response {
  return textResponse("Not found", 404);
}

function methodNotAllowed(): Response {
  return textResponse("Method not allowed", 405);
}

export default {
  async fetch(request: Request, env: Env, context: FilterContext = {}): Promise<Response> {
    const url = new URL(request.url);
    if (url.pathname === "/health") {
      return handleHealthCheck();
    }

    if (url.pathname === "/filter") {
      if (request.method !== "GET" && request.method !== "POST") {
        return methodNotAllowed();
      }
      try {
        return await handleFilterRequest(request, env, context);
      } catch (error) {
        log.error({ err: error }, "Failed to process filter request");
        return textResponse("Internal server error", 500);
      }
    }

    return notFound();
  },
};
