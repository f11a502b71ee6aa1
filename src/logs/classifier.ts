import type { ChangeType } from "./types.js";

export type ClassificationRule = {
  readonly type: ChangeType;
  /** Higher runs first. Rules sharing a priority keep their declaration order. */
  readonly priority: number;
  readonly pattern: RegExp;
};

export type ChangeClassification = {
  readonly type: ChangeType;
  readonly priority: number;
};

export type ChangeClassifier = {
  readonly rules: readonly ClassificationRule[];
  classify: (text: string) => ChangeClassification;
};

export const UNKNOWN_CLASSIFICATION: ChangeClassification = Object.freeze({
  type: "unknown",
  priority: 0,
});

// Specific categories sit above general ones so that "error while updating x"
// resolves to "error" and not "modification".
const defaultRules: ClassificationRule[] = [
  {
    type: "error",
    priority: 100,
    pattern: /\b(?:error|exception|traceback|failed|failure|fatal|panic)\b/,
  },
  {
    type: "patch",
    priority: 90,
    pattern: /\*\*\* (?:begin patch|add file|update file|delete file)|^@@ |^diff --git /m,
  },
  {
    type: "deletion",
    priority: 80,
    pattern: /\b(?:delete|deleted|deleting|remove|removed|removing|rm)\b/,
  },
  {
    type: "creation",
    priority: 70,
    pattern: /\b(?:create|created|creating|new file|added file)\b/,
  },
  {
    type: "command",
    priority: 60,
    pattern: /^\s*\$ |\b(?:ran|running|executed|exec|command)\b/m,
  },
  {
    type: "tool_use",
    priority: 50,
    pattern: /\b(?:tool_call|function_call|tool_use)\b/,
  },
  {
    type: "modification",
    priority: 40,
    pattern: /\b(?:modify|modified|modification|update|updated|updating|edit|edited|change|changed)\b/,
  },
];

export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] =
  Object.freeze(defaultRules);

export function createChangeClassifier(
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
): ChangeClassifier {
  const ordered = rules
    .map((rule, index) => ({ rule: toCaseInsensitiveRule(rule), index }))
    .sort((left, right) => right.rule.priority - left.rule.priority || left.index - right.index)
    .map(({ rule }) => rule);
  const frozen = Object.freeze(ordered);

  return {
    rules: frozen,
    classify: (text) => {
      for (const rule of frozen) {
        if (rule.pattern.test(text)) {
          return { type: rule.type, priority: rule.priority };
        }
      }
      return UNKNOWN_CLASSIFICATION;
    },
  };
}

const defaultClassifier = createChangeClassifier();

export function classifyChange(text: string): ChangeClassification {
  return defaultClassifier.classify(text);
}

function toCaseInsensitiveRule(rule: ClassificationRule): ClassificationRule {
  // Global/sticky flags would make `test` stateful across calls.
  const flags = new Set(rule.pattern.flags.replace(/[gy]/g, ""));
  flags.add("i");
  return Object.freeze({
    type: rule.type,
    priority: rule.priority,
    pattern: new RegExp(rule.pattern.source, [...flags].join("")),
  });
}
