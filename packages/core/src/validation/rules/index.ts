/**
 * The default rule catalog.
 */

import { createRuleSet, type Rule, type RuleSet } from "../rule.js";
import { linkRules } from "./links.js";
import { manifestRules } from "./manifest.js";
import { feedRules } from "./feed.js";

export { linkRules, manifestRules, feedRules };
export { isAbsoluteUri, isIsoDate, temporalOffset } from "./manifest.js";
export { isAcquisitionLink, isUriReference } from "./feed.js";

/** Every default rule, in dispatch order. */
export const defaultRules: readonly Rule[] = Object.freeze([...linkRules, ...manifestRules, ...feedRules]);

/** Rule set used when a caller does not supply one. Built once, read-only. */
export const defaultRuleSet: RuleSet = createRuleSet(defaultRules);
