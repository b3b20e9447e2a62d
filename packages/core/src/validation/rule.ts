/**
 * @title Rules
 * @description Rule contract and rule-set construction.
 *
 * Each rule declares the node types it applies to. A rule set turns those
 * declarations into a dispatch table once, so traversal never probes rules
 * for applicability.
 *
 * @module validation
 */

import { RuleSetError } from "../errors.js";
import { NODE_TYPES, type NodeType } from "../types/nodes.js";
import type { NodePath } from "../types/path.js";
import type { Document, NodeOfType } from "../types/index.js";
import type { DocumentIndex } from "./document-index.js";
import type { Severity } from "./report.js";

/**
 * What a rule reports. The engine adds severity and rule id.
 */
export interface Violation {
	message: string;
	/** Location of the violation. Defaults to the path of the checked node. */
	path?: NodePath;
	suggestion?: string;
}

/**
 * Tunable thresholds shared by every rule in a run.
 */
export interface RuleOptions {
	/** Allowed difference in seconds between declared and summed durations. */
	readonly durationTolerance: number;
	/** Accept a reading order that lists the same resource more than once. */
	readonly allowRepeatedResources: boolean;
}

/**
 * Read-only view of the whole document handed to every rule.
 */
export interface RuleContext {
	readonly document: Document;
	readonly index: DocumentIndex;
	readonly options: RuleOptions;
}

/**
 * A named, stateless check over nodes of the types in `appliesTo`.
 *
 * `check` must not throw for a well-typed node; a thrown error is treated as
 * a defect in the rule and aborts the run.
 */
export interface Rule<T extends NodeType = NodeType> {
	readonly id: string;
	/** Severity of every finding this rule produces. */
	readonly severity: Severity;
	readonly description: string;
	readonly appliesTo: readonly T[];
	check(node: NodeOfType<T>, context: RuleContext): Iterable<Violation>;
}

/**
 * Rules indexed by the node types they apply to.
 */
export interface RuleSet {
	/** Rules in registration order. */
	readonly rules: readonly Rule[];
	/** Rules to run on a node of the given type, in registration order. */
	rulesFor(nodeType: NodeType): readonly Rule[];
	/** Look up a rule by id. */
	get(id: string): Rule | undefined;
}

const KNOWN_NODE_TYPES: ReadonlySet<string> = new Set<string>(NODE_TYPES);
const NO_RULES: readonly Rule[] = Object.freeze([]);

/**
 * Define a rule, keeping its node types precise for `check`.
 */
export function defineRule<T extends NodeType>(rule: Rule<T>): Rule<T> {
	return Object.freeze({ ...rule, appliesTo: Object.freeze([...rule.appliesTo]) });
}

/**
 * Build a rule set from a list of rules.
 *
 * @param rules - Rules in the order their findings should appear per node
 * @returns Frozen rule set
 * @throws RuleSetError on a duplicate id, an empty `appliesTo` or an unknown node type
 */
export function createRuleSet(rules: readonly Rule[]): RuleSet {
	const byId = new Map<string, Rule>();
	const byType = new Map<NodeType, Rule[]>();

	for (const rule of rules) {
		if (byId.has(rule.id)) {
			throw new RuleSetError(`Duplicate rule id "${rule.id}"`);
		}
		if (rule.appliesTo.length === 0) {
			throw new RuleSetError(`Rule "${rule.id}" applies to no node type`);
		}
		byId.set(rule.id, rule);

		for (const nodeType of rule.appliesTo) {
			if (!KNOWN_NODE_TYPES.has(nodeType)) {
				throw new RuleSetError(`Rule "${rule.id}" applies to unknown node type "${nodeType}"`);
			}
			const list = byType.get(nodeType) ?? [];
			if (!list.includes(rule)) {
				list.push(rule);
			}
			byType.set(nodeType, list);
		}
	}

	const dispatch = new Map<NodeType, readonly Rule[]>();
	for (const [nodeType, list] of byType) {
		dispatch.set(nodeType, Object.freeze(list));
	}
	const ordered = Object.freeze([...rules]);

	return Object.freeze({
		rules: ordered,
		rulesFor: (nodeType: NodeType) => dispatch.get(nodeType) ?? NO_RULES,
		get: (id: string) => byId.get(id),
	});
}
