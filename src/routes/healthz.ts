import type { FastifyInstance } from "fastify";

export async function healthRoutes(app: FastifyInstance, opts: { provider: string; teamMode: boolean }) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "support-reply-gate",
    provider: opts.provider,
    teamMode: opts.teamMode,
    ts: new Date().toISOString(),
  }));
}
