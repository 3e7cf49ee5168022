import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import type { Server } from "node:http";
import { parseBugCreateRequest } from "./bugs/schema.js";
import { ConfigurationError, ProxyError, RequestValidationError } from "./errors.js";
import type { WorkItemProxy } from "./proxy/workItemProxy.js";

export const SERVICE_NAME = "devops-bug-proxy";

export interface AppDeps {
  /** The proxy, or the configuration error that kept it from being built */
  proxy: WorkItemProxy | ConfigurationError;
  /** Largest accepted JSON body, in body-parser notation */
  bodyLimit?: string;
}

export const DEFAULT_BODY_LIMIT = "10mb";

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "*",
  "Access-Control-Allow-Methods": "*",
};

const cors: RequestHandler = (req, res, next) => {
  res.set(CORS_HEADERS);
  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }
  next();
};

function isBodyParseError(err: unknown): err is SyntaxError & { type: string } {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

// body-parser rejections (413, 415, bad encoding) carry an exposable client status
function isClientHttpError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500 &&
    "expose" in err &&
    err.expose === true
  );
}

const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (isBodyParseError(err)) {
    const invalid = new RequestValidationError([{ loc: ["body"], msg: "JSON decode error", type: "json_invalid" }]);
    res.status(invalid.status).json({ detail: invalid.detail });
    return;
  }

  if (err instanceof ProxyError) {
    res.status(err.status).json({ detail: err.detail });
    return;
  }

  if (isClientHttpError(err)) {
    res.status(err.status).json({ detail: err.message });
    return;
  }

  console.error(`[server] Unhandled error on ${req.method} ${req.path}:`, err);
  res.status(500).json({ detail: "Internal Server Error" });
};

export function createApp({ proxy, bodyLimit = DEFAULT_BODY_LIMIT }: AppDeps): express.Express {
  const app = express();

  function requireProxy(): WorkItemProxy {
    if (proxy instanceof ConfigurationError) throw proxy;
    return proxy;
  }

  app.use(cors);
  app.use(express.json({ limit: bodyLimit }));

  app.get("/", (_req, res) => {
    res.json({ status: "ok", service: SERVICE_NAME });
  });

  // GET /projects: organization projects, verbatim from Azure DevOps
  app.get("/projects", async (_req, res) => {
    const projects = await requireProxy().listProjects();
    res.json(projects);
  });

  // POST /bugs: create a Bug under a parent user story
  app.post("/bugs", async (req, res) => {
    const input = parseBugCreateRequest(req.body);
    const created = await requireProxy().createBug(input);
    res.status(201).json(created);
  });

  app.use(errorHandler);

  return app;
}

export function startServer(app: express.Express, port: number): Server {
  return app.listen(port, () => {
    console.log(`[server] listening on port ${port}`);
  });
}
