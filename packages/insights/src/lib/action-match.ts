import type { ActionStep, EntityMatch } from "./stores/types.js";
import { type QueryParams, and, escapeRegex, or } from "./sql.js";

const CURRENT_URL = "JSONExtractString(properties, '$current_url')";

/** `"` inside a chain attribute value is stored backslash-escaped. */
function chainValue(value: string): string {
  return value.replace(/"/g, '\\"');
}

/** Element whose tag is exactly `tag`. */
function tagPattern(tag: string): string {
  return `(^|;)${escapeRegex(tag)}([.:;]|$)`;
}

/** Element carrying `className` among its classes. */
function classPattern(className: string): string {
  return `(^|;)[^;:]*\\.${escapeRegex(className)}([.:;]|$)`;
}

function attributeCondition(attribute: string, value: string, params: QueryParams): string {
  return `position(elements_chain, ${params.add(`${attribute}="${chainValue(value)}"`, "String", "el")}) > 0`;
}

/**
 * Conditions for a CSS selector. Only its rightmost compound selector
 * (`button.btn#pay`) is checked, each part against any element in the chain.
 */
function selectorConditions(selector: string, params: QueryParams): string[] {
  const compounds = selector.trim().split(/[\s>+~]+/).filter(Boolean);
  const last = compounds[compounds.length - 1];
  if (!last) return [];

  const conditions: string[] = [];
  for (const part of last.match(/[#.]?[^#.]+/g) ?? []) {
    if (part.startsWith(".")) {
      conditions.push(`match(elements_chain, ${params.add(classPattern(part.slice(1)), "String", "el")})`);
    } else if (part.startsWith("#")) {
      conditions.push(attributeCondition("attr_id", part.slice(1), params));
    } else if (part !== "*") {
      conditions.push(`match(elements_chain, ${params.add(tagPattern(part), "String", "el")})`);
    }
  }
  return conditions;
}

function compileStep(step: ActionStep, params: QueryParams): string {
  const conditions: string[] = [];

  if (step.event) {
    conditions.push(`event = ${params.add(step.event, "String", "step")}`);
  }
  if (step.url) {
    const url = params.add(step.url, "String", "step");
    switch (step.urlMatching ?? "contains") {
      case "exact":
        conditions.push(`${CURRENT_URL} = ${url}`);
        break;
      case "regex":
        conditions.push(`match(${CURRENT_URL}, ${url})`);
        break;
      case "contains":
        conditions.push(`position(${CURRENT_URL}, ${url}) > 0`);
        break;
    }
  }
  if (step.tagName) {
    conditions.push(`match(elements_chain, ${params.add(tagPattern(step.tagName), "String", "el")})`);
  }
  if (step.text) conditions.push(attributeCondition("text", step.text, params));
  if (step.href) conditions.push(attributeCondition("href", step.href, params));
  if (step.selector) conditions.push(...selectorConditions(step.selector, params));

  return and(conditions);
}

/**
 * Compile which events belong to an entity: a literal event name, or any
 * step of an action. An action without steps matches nothing.
 */
export function compileEntityMatch(match: EntityMatch, params: QueryParams): string {
  if (match.kind === "event") {
    return `event = ${params.set("eventName", match.event, "String")}`;
  }
  return or(match.steps.map((step) => compileStep(step, params)));
}
