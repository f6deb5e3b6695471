import type { FastifyInstance } from "fastify";
import { CritiqueDecisionInput } from "../schemas/critique.js";
import type { Critic } from "../critique/orchestrator.js";
import { getConfig } from "../config/index.js";
import { getRequestId } from "../utils/request-id.js";
import { buildErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";

export interface CritiqueRouteDeps {
  critic: Critic;
}

export default async function route(app: FastifyInstance, deps: CritiqueRouteDeps): Promise<void> {
  const { critic } = deps;

  app.post("/assist/v1/critique-decision", async (req, reply) => {
    const start = Date.now();
    const requestId = getRequestId(req);
    const cfg = getConfig();

    reply.header("X-Critique-Feature-Version", cfg.critique.featureVersion);

    const parsed = CritiqueDecisionInput.safeParse(req.body);
    if (!parsed.success) {
      emit(TelemetryEvents.CritiqueFailed, {
        request_id: requestId,
        latency_ms: Date.now() - start,
        error_code: "BAD_INPUT",
        http_status: 400,
      });
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, requestId));
    }

    const input = parsed.data;
    const maxChars = cfg.critique.maxTextChars;
    const oversized = [
      input.decision.length > maxChars ? "decision" : null,
      (input.context?.length ?? 0) > maxChars ? "context" : null,
    ].filter((f): f is string => f !== null);

    if (oversized.length > 0) {
      emit(TelemetryEvents.CritiqueFailed, {
        request_id: requestId,
        latency_ms: Date.now() - start,
        error_code: "BAD_INPUT",
        http_status: 400,
      });
      reply.code(400);
      return reply.send(
        buildErrorV1(
          "BAD_INPUT",
          `Text exceeds ${maxChars} characters`,
          { fields: oversized, max_chars: maxChars },
          requestId
        )
      );
    }

    emit(TelemetryEvents.CritiqueRequested, {
      request_id: requestId,
      decision_chars: input.decision.length,
      context_chars: input.context?.length ?? 0,
      intensity: input.intensity,
      use_external_model: input.use_external_model === true,
      external_model_available: critic.externalModelAvailable,
    });

    const result = await critic.analyze(
      {
        decision: input.decision,
        context: input.context,
        intensity: input.intensity,
        useExternalModel: input.use_external_model,
      },
      { requestId }
    );

    emit(TelemetryEvents.CritiqueSucceeded, {
      request_id: requestId,
      latency_ms: Date.now() - start,
      source: result.source,
      tier: result.intensity.tier,
      confidence: result.confidence,
      bias_flag_count: result.bias_findings.length,
      counterargument_count: result.counterarguments.length,
      warning_count: result.warnings.length,
    });

    return reply.send(result);
  });
}
