#!/usr/bin/env tsx
// Local stand-in for the serverless runtime: serves api/estimate on API_PORT.
import "dotenv/config";
import { createServer, type ServerResponse } from "node:http";

import estimateHandler from "../api/estimate";

type JsonResponse = {
  status: (code: number) => JsonResponse;
  json: (payload: unknown) => void;
  setHeader: (name: string, value: string) => void;
};

const wrapResponse = (res: ServerResponse): JsonResponse => {
  const wrapped: JsonResponse = {
    status: (code) => {
      res.statusCode = code;
      return wrapped;
    },
    json: (payload) => {
      res.end(JSON.stringify(payload));
    },
    setHeader: (name, value) => {
      res.setHeader(name, value);
    },
  };
  return wrapped;
};

const port = Number(process.env.API_PORT ?? 8000);

const server = createServer((req, res) => {
  const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
  if (pathname !== "/api/estimate") {
    wrapResponse(res).status(404).json({ error: "Not found" });
    return;
  }
  estimateHandler(req, wrapResponse(res)).catch((error: unknown) => {
    console.error("[dev-api] unhandled error:", error);
    if (!res.headersSent) res.statusCode = 500;
    res.end();
  });
});

server.listen(port, () => {
  console.log(`[dev-api] listening on http://localhost:${port}`);
});
