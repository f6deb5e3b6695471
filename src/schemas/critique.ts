import { z } from "zod";

/**
 * POST /assist/v1/critique-decision request body.
 * Text length caps are applied by the route from config.
 */
export const CritiqueDecisionInput = z.object({
  decision: z.string(),
  context: z.string().optional(),
  intensity: z.number().finite().optional(),
  use_external_model: z.boolean().optional(),
});

/**
 * Shape the external model must return. Unknown keys are stripped.
 */
export const ModelArgumentReply = z.object({
  counterarguments: z.array(z.string()),
  impacts: z.array(z.string()),
  recommendations: z.array(z.string()),
});
