import { EmptyQueryError } from "../utils/errors";
import { FALLBACK_RULE, RULES } from "./rules";
import type { Domain, Intent, Rule } from "./types";

/**
 * Runs the ordered rule list of `domain` against a question.
 *
 * A terminal rule only competes while nothing has accumulated and ends the
 * walk when it matches. Accumulating rules append and let the walk continue.
 * When no rule matches, the domain's statistics fallback is returned.
 */
export function extractIntents(
  question: string,
  domain: Domain,
  rules: readonly Rule[] = RULES[domain],
): Intent[] {
  if (!question.trim()) throw new EmptyQueryError();

  const lower = question.toLowerCase();
  const intents: Intent[] = [];

  for (const rule of rules) {
    if (rule.terminal && intents.length > 0) continue;
    const params = rule.match(lower, question);
    if (!params) continue;

    intents.push({
      ruleId: rule.id,
      domain,
      params,
      confident: true,
      question,
    });
    if (rule.terminal) break;
  }

  if (intents.length === 0) {
    intents.push({
      ruleId: FALLBACK_RULE[domain],
      domain,
      params: {},
      confident: false,
      question,
    });
  }

  return intents;
}
