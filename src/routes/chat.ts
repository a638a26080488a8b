import type { FastifyInstance } from "fastify";

import { ChatRequest } from "../contracts/pipeline";
import type { PipelineOrchestrator } from "../control-plane/orchestrator";
import type { SupportStore } from "../store/support_store";

export async function chatRoutes(
  app: FastifyInstance,
  opts: { orchestrator: PipelineOrchestrator; store: SupportStore }
) {
  const { orchestrator, store } = opts;

  app.options("/chat", async (_req, reply) => reply.code(204).send());

  app.post("/chat", async (req, reply) => {
    const parsed = ChatRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const body = parsed.data;
    const result = await orchestrator.process({
      message: body.message,
      sessionId: body.session_id,
      conversationId: body.conversation_id,
      contact: body.contact,
      channel: body.metadata?.channel,
      teamMode: body.team_mode,
    });

    req.log.info(
      { evt: "chat.completed", sessionId: result.session_id, decision: result.decision, category: result.category },
      "chat.completed"
    );
    return reply.send(result);
  });

  // Debug endpoint: a session with its turns and evaluations.
  app.get<{ Params: { id: string } }>("/sessions/:id", async (req, reply) => {
    const session = await store.getSession(req.params.id);
    if (!session) {
      return reply.code(404).send({ error: "not_found" });
    }
    const [messages, evaluations] = await Promise.all([
      store.getMessages(session.sessionId),
      store.getEvalResults(session.sessionId),
    ]);
    return reply.send({ session, messages, evaluations });
  });
}
