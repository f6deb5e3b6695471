import type { IntentRecord } from "../types.js";
import { containsAny } from "../text-signals.js";
import { TIMEFRAME_NOT_SPECIFIED } from "../intent.js";
import {
  BUDGET_CONSTRAINT_KEYWORDS,
  INTEGRATION_KEYWORDS,
  LAUNCH_KEYWORDS,
  SPEND_KEYWORDS,
} from "../constants/keywords.js";

export interface ConditionalTemplate {
  id: string;
  applies: (intent: IntentRecord) => boolean;
  render: (intent: IntentRecord) => string;
}

function combined(intent: IntentRecord): string {
  return `${intent.decision} ${intent.context}`;
}

/**
 * Counterargument templates, evaluated in order.
 */
export const COUNTERARGUMENT_TEMPLATES: readonly ConditionalTemplate[] = [
  {
    id: "timeline_aggression",
    applies: (intent) => intent.timeframe !== TIMEFRAME_NOT_SPECIFIED,
    render: (intent) =>
      `Timeline risk: a ${intent.timeframe} horizon leaves little slack for the delays, rework and dependencies that most initiatives hit; what happens if it takes twice as long?`,
  },
  {
    id: "scale_before_validation",
    applies: (intent) => intent.signals.scale,
    render: () =>
      "Scaling before validation: expanding reach before core assumptions are proven multiplies the cost of being wrong.",
  },
  {
    id: "urgency_crowds_out_diligence",
    applies: (intent) => intent.signals.urgency,
    render: () =>
      "Urgency crowds out diligence: pressure to move immediately tends to skip the checks that would catch a flawed premise.",
  },
  {
    id: "upfront_commitment",
    applies: (intent) => containsAny(combined(intent), SPEND_KEYWORDS),
    render: () =>
      "Upfront commitment: spending heavily early creates pressure to keep going even if early signals are negative.",
  },
  {
    id: "certainty_masks_assumptions",
    applies: (intent) => intent.signals.certainty,
    render: () =>
      "Untested assumptions: treating the outcome as certain hides the assumptions it depends on; name them and ask which one is weakest.",
  },
  {
    id: "budget_downside",
    applies: (intent) => containsAny(intent.context, BUDGET_CONSTRAINT_KEYWORDS),
    render: () =>
      "Budget downside: under a constrained budget, a result at half the expected return may leave no room to recover or change course.",
  },
];

export const GENERIC_COUNTERARGUMENT =
  "Underestimated uncertainty: the decision may be underestimating how much is unknown; what evidence would change your mind?";

export const PRE_MORTEM_PROMPT =
  "Pre-mortem: imagine it is a year from now and this decision failed. Write down the three most likely reasons why.";

export const IRREVERSIBLE_COST_PROMPT =
  "Irreversible cost: which parts of this decision cannot be undone, and what would reversing the rest actually cost in money, time and credibility?";

/**
 * Impact templates that apply only when their trigger language is present.
 */
export const CONDITIONAL_IMPACT_TEMPLATES: readonly ConditionalTemplate[] = [
  {
    id: "operational_load_spike",
    applies: (intent) => containsAny(combined(intent), LAUNCH_KEYWORDS),
    render: () =>
      "Operational load spike: a launch or scale-up can overload support, onboarding and infrastructure before capacity catches up.",
  },
  {
    id: "integration_delay_cascade",
    applies: (intent) => containsAny(combined(intent), INTEGRATION_KEYWORDS),
    render: () =>
      "Integration delay cascade: a slip in one integration or platform dependency can push back every downstream milestone.",
  },
];

export const ALWAYS_IMPACTS: readonly string[] = [
  "Reputational cost of reversal: walking the decision back publicly can erode credibility with customers and the market.",
  "Reduced optionality: committing resources now narrows the alternatives available if conditions change.",
];

export const STAKEHOLDER_TRUST_IMPACT =
  "Stakeholder trust erosion: if results miss the promises made to justify this decision, future proposals will face more skepticism.";

/**
 * De-risking actions, in priority order.
 */
export const RECOMMENDATIONS: readonly string[] = [
  "Run a time-boxed pilot with a small group to validate the key assumptions before full commitment.",
  "Define explicit go/no-go criteria and the metrics that will trigger each outcome before starting.",
  "Stage the funding in tranches released only when the previous milestone is met.",
  "Add a checkpoint before any irreversible action where the team must re-confirm the decision against fresh evidence.",
];
