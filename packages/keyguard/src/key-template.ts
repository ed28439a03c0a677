/**
 * keyguard/key-template
 *
 * Renders store keys from a template and the arguments of a call.
 *
 * Placeholders:
 * - `{userId}` - named parameter (names come from the `params` option)
 * - `{user.id}`, `{items[0]}` - bounded path into an argument
 * - `{0}` - explicit positional argument
 * - `{}` - next positional argument
 * - `{{` and `}}` - literal braces
 *
 * @example
 * ```typescript
 * const template = parseKeyTemplate('read_user-{user.id}');
 * const key = resolveKey(template, bindArguments(['user'], [{ id: 7 }]));
 * // 'read_user-7'
 * ```
 */

import { KeyResolutionError } from "./errors";
import { describeError } from "./events";

// =============================================================================
// Types
// =============================================================================

export type PathStep =
  | { kind: "property"; name: string }
  | { kind: "index"; index: number };

export type FieldRoot =
  | { kind: "named"; name: string }
  | { kind: "positional"; index: number };

export type TemplateSegment =
  | { kind: "literal"; text: string }
  | { kind: "field"; raw: string; root: FieldRoot; path: readonly PathStep[] };

/**
 * A parsed key template. Immutable; parse once and reuse for every call.
 */
export interface KeyTemplate {
  readonly source: string;
  readonly segments: readonly TemplateSegment[];
  /** Named parameter roots referenced by the template */
  readonly names: readonly string[];
}

/**
 * Call arguments mapped to parameter names.
 */
export interface BoundArguments {
  readonly named: ReadonlyMap<string, unknown>;
  readonly positional: readonly unknown[];
}

// =============================================================================
// Parsing
// =============================================================================

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const DIGITS = /^\d+$/;

function malformed(source: string, detail: string, field?: string): KeyResolutionError {
  return new KeyResolutionError(
    `KeyResolutionError: malformed key template "${source}": ${detail}`,
    source,
    "malformed_template",
    field
  );
}

/**
 * Parse a template into literal and field segments.
 * Throws KeyResolutionError for malformed templates.
 */
export function parseKeyTemplate(source: string): KeyTemplate {
  const segments: TemplateSegment[] = [];
  const names: string[] = [];
  let literal = "";
  let autoIndex = 0;
  let numbering: "auto" | "manual" | undefined;
  let i = 0;

  const flushLiteral = (): void => {
    if (literal.length > 0) {
      segments.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  while (i < source.length) {
    const char = source[i];

    if (char === "{" && source[i + 1] === "{") {
      literal += "{";
      i += 2;
      continue;
    }
    if (char === "}" && source[i + 1] === "}") {
      literal += "}";
      i += 2;
      continue;
    }
    if (char === "}") {
      throw malformed(source, `unmatched "}" at position ${i}`);
    }
    if (char !== "{") {
      literal += char;
      i++;
      continue;
    }

    const close = source.indexOf("}", i + 1);
    if (close === -1) {
      throw malformed(source, `unclosed "{" at position ${i}`);
    }
    const raw = source.slice(i + 1, close);
    if (raw.includes("{")) {
      throw malformed(source, `nested "{" in field "${raw}"`, raw);
    }
    if (raw.includes(":") || raw.includes("!")) {
      throw malformed(source, `format specifiers are not supported in "${raw}"`, raw);
    }

    const { rootText, path } = parseFieldBody(source, raw);
    let root: FieldRoot;
    if (rootText === "") {
      if (numbering === "manual") {
        throw malformed(source, "cannot mix automatic and explicit positional fields", raw);
      }
      numbering = "auto";
      root = { kind: "positional", index: autoIndex++ };
    } else if (DIGITS.test(rootText)) {
      if (numbering === "auto") {
        throw malformed(source, "cannot mix automatic and explicit positional fields", raw);
      }
      numbering = "manual";
      root = { kind: "positional", index: Number(rootText) };
    } else if (IDENTIFIER.test(rootText)) {
      root = { kind: "named", name: rootText };
      if (!names.includes(rootText)) names.push(rootText);
    } else {
      throw malformed(source, `invalid field name "${rootText}"`, raw);
    }

    flushLiteral();
    segments.push({ kind: "field", raw, root, path });
    i = close + 1;
  }

  flushLiteral();
  return { source, segments, names };
}

function parseFieldBody(
  source: string,
  raw: string
): { rootText: string; path: PathStep[] } {
  const rootEnd = raw.search(/[.[]/);
  const rootText = rootEnd === -1 ? raw : raw.slice(0, rootEnd);
  const path: PathStep[] = [];
  let rest = rootEnd === -1 ? "" : raw.slice(rootEnd);

  while (rest.length > 0) {
    if (rest.startsWith(".")) {
      const end = rest.slice(1).search(/[.[]/);
      const name = end === -1 ? rest.slice(1) : rest.slice(1, end + 1);
      if (name.length === 0 || name.includes("]")) {
        throw malformed(source, `empty or invalid attribute in "${raw}"`, raw);
      }
      path.push({ kind: "property", name });
      rest = rest.slice(name.length + 1);
      continue;
    }

    // rest starts with "["
    const end = rest.indexOf("]");
    if (end === -1) {
      throw malformed(source, `unclosed "[" in "${raw}"`, raw);
    }
    const inner = rest.slice(1, end);
    if (inner.length === 0 || inner.includes("[")) {
      throw malformed(source, `empty or invalid index in "${raw}"`, raw);
    }
    path.push(
      DIGITS.test(inner)
        ? { kind: "index", index: Number(inner) }
        : { kind: "property", name: inner }
    );
    rest = rest.slice(end + 1);
    if (rest.length > 0 && !rest.startsWith(".") && !rest.startsWith("[")) {
      throw malformed(source, `unexpected "${rest}" after index in "${raw}"`, raw);
    }
  }

  return { rootText, path };
}

// =============================================================================
// Binding
// =============================================================================

/**
 * Map call arguments onto declared parameter names.
 * Arguments past the declared names stay reachable positionally.
 */
export function bindArguments(
  params: readonly string[],
  args: readonly unknown[]
): BoundArguments {
  const named = new Map<string, unknown>();
  params.forEach((name, index) => {
    named.set(name, args[index]);
  });
  return { named, positional: args };
}

/**
 * Check at decoration time that every named placeholder is a declared parameter.
 */
export function assertTemplateParams(
  template: KeyTemplate,
  params: readonly string[]
): void {
  for (const name of template.names) {
    if (!params.includes(name)) {
      throw new KeyResolutionError(
        `KeyResolutionError: key template "${template.source}" references {${name}} but params are [${params.join(", ")}]`,
        template.source,
        "unknown_parameter",
        name
      );
    }
  }
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Render a key. Pure and deterministic: no store access.
 */
export function resolveKey(template: KeyTemplate, bound: BoundArguments): string {
  let key = "";
  for (const segment of template.segments) {
    if (segment.kind === "literal") {
      key += segment.text;
      continue;
    }
    const base = readRoot(template, segment, bound);
    key += renderField(template, segment, walkPath(template, segment, base));
  }
  return key;
}

function renderField(
  template: KeyTemplate,
  segment: Extract<TemplateSegment, { kind: "field" }>,
  value: unknown
): string {
  try {
    return renderValue(value);
  } catch (error) {
    throw new KeyResolutionError(
      `KeyResolutionError: {${segment.raw}} in "${template.source}" cannot be rendered: ${describeError(error)}`,
      template.source,
      "unrenderable_value",
      segment.raw
    );
  }
}

function readRoot(
  template: KeyTemplate,
  segment: Extract<TemplateSegment, { kind: "field" }>,
  bound: BoundArguments
): unknown {
  const { root } = segment;
  if (root.kind === "named") {
    if (!bound.named.has(root.name)) {
      throw new KeyResolutionError(
        `KeyResolutionError: {${segment.raw}} in "${template.source}" is not a parameter`,
        template.source,
        "unknown_parameter",
        segment.raw
      );
    }
    return bound.named.get(root.name);
  }
  if (root.index >= bound.positional.length) {
    throw new KeyResolutionError(
      `KeyResolutionError: {${segment.raw}} in "${template.source}" needs argument ${root.index} but the call has ${bound.positional.length}`,
      template.source,
      "missing_positional",
      segment.raw
    );
  }
  return bound.positional[root.index];
}

function walkPath(
  template: KeyTemplate,
  segment: Extract<TemplateSegment, { kind: "field" }>,
  base: unknown
): unknown {
  let current = base;
  for (const step of segment.path) {
    const next = readStep(current, step);
    if (!next.found) {
      const label = step.kind === "index" ? `[${step.index}]` : `.${step.name}`;
      throw new KeyResolutionError(
        `KeyResolutionError: {${segment.raw}} in "${template.source}" does not resolve at ${label}`,
        template.source,
        "unresolved_path",
        segment.raw
      );
    }
    current = next.value;
  }
  return current;
}

function readStep(
  value: unknown,
  step: PathStep
): { found: true; value: unknown } | { found: false } {
  if (step.kind === "index" && Array.isArray(value)) {
    return step.index < value.length
      ? { found: true, value: value[step.index] }
      : { found: false };
  }
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return { found: false };
  }
  const name = step.kind === "index" ? String(step.index) : step.name;
  if (!(name in value)) {
    return { found: false };
  }
  return { found: true, value: Reflect.get(value, name) };
}

/**
 * Parse and check a template once, returning a renderer for call arguments.
 */
export function compileKeyTemplate(
  source: string,
  params: readonly string[] = []
): (args: readonly unknown[]) => string {
  const template = parseKeyTemplate(source);
  assertTemplateParams(template, params);
  return (args) => resolveKey(template, bindArguments(params, args));
}

// =============================================================================
// Rendering
// =============================================================================

function hasToJSON(value: object): boolean {
  return "toJSON" in value && typeof value.toJSON === "function";
}

// Copy with sorted object keys. JSON.stringify applies toJSON itself.
function canonical(value: unknown, ancestors: Set<object>): unknown {
  if (typeof value === "bigint") return value.toString();
  if (typeof value !== "object" || value === null || hasToJSON(value)) return value;
  if (ancestors.has(value)) {
    throw new TypeError("value contains a circular reference");
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) return value.map((item) => canonical(item, ancestors));
    const sorted: Record<string, unknown> = {};
    for (const name of Object.keys(value).sort()) {
      sorted[name] = canonical(Reflect.get(value, name), ancestors);
    }
    return sorted;
  } finally {
    ancestors.delete(value);
  }
}

function stableStringify(value: unknown): string {
  return JSON.stringify(canonical(value, new Set()));
}

/**
 * String form of an argument inside a key.
 */
export function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (
    value === null ||
    value === undefined ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    typeof value === "symbol" ||
    typeof value === "function"
  ) {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (
    Array.isArray(value) ||
    Object.getPrototypeOf(value) === null ||
    value.toString === Object.prototype.toString
  ) {
    return stableStringify(value);
  }
  return String(value);
}
