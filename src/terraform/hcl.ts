/**
 * HCL writer — builds Terraform blocks and renders them as text.
 *
 * Attributes and nested blocks render in the order they were added; map keys render
 * sorted so that output never depends on property order in the source diagram.
 */

// =============================================================================
// Values
// =============================================================================

/**
 * A raw HCL expression such as `var.aws_region` or `aws_vpc.main.id`.
 */
export class HclExpression {
  constructor(readonly text: string) {}
}

export type HclValue =
  | string
  | number
  | boolean
  | null
  | HclExpression
  | readonly HclValue[]
  | { readonly [key: string]: HclValue };

export function expr(text: string): HclExpression {
  return new HclExpression(text);
}

/**
 * Expression pointing at an attribute of another resource, e.g. `aws_vpc.main.id`.
 */
export function reference(address: string, attribute?: string): HclExpression {
  return new HclExpression(attribute ? `${address}.${attribute}` : address);
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Quote a string literal, escaping template sequences so values are never interpolated.
 */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\$\{/g, () => "$${")
    .replace(/%\{/g, "%%{");
  return `"${escaped}"`;
}

function formatKey(key: string): string {
  return IDENTIFIER.test(key) ? key : quote(key);
}

function isValueList(value: HclValue): value is readonly HclValue[] {
  return Array.isArray(value);
}

/**
 * Format a value for the right-hand side of an attribute at `indent` spaces.
 */
export function formatValue(value: HclValue, indent = 0): string {
  if (value === null) return "null";
  if (value instanceof HclExpression) return value.text;
  if (typeof value === "string") return quote(value);
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "null";
  if (typeof value === "boolean") return String(value);
  if (isValueList(value)) {
    return `[${value.map((v) => formatValue(v, indent)).join(", ")}]`;
  }

  const keys = Object.keys(value).sort();
  if (keys.length === 0) return "{}";
  const pad = " ".repeat(indent);
  const inner = keys.map((k) => `${pad}  ${formatKey(k)} = ${formatValue(value[k], indent + 2)}`);
  return `{\n${inner.join("\n")}\n${pad}}`;
}

// =============================================================================
// Blocks
// =============================================================================

type BodyItem =
  | { kind: "attribute"; name: string; value: HclValue }
  | { kind: "block"; block: HclBlock };

export class HclBlock {
  private items: BodyItem[] = [];

  constructor(
    readonly type: string,
    readonly labels: readonly string[] = [],
  ) {}

  /**
   * Set an attribute; setting the same name again replaces the value in place.
   */
  set(name: string, value: HclValue): this {
    const existing = this.items.find(
      (item): item is Extract<BodyItem, { kind: "attribute" }> => item.kind === "attribute" && item.name === name,
    );
    if (existing) existing.value = value;
    else this.items.push({ kind: "attribute", name, value });
    return this;
  }

  /**
   * Set a string attribute only when it is non-empty.
   */
  setString(name: string, value: string): this {
    return value === "" ? this : this.set(name, value);
  }

  /**
   * Set a map attribute only when it has entries.
   */
  setMap(name: string, value: Record<string, string>): this {
    return Object.keys(value).length === 0 ? this : this.set(name, value);
  }

  appendBlock(type: string, labels: readonly string[] = []): HclBlock {
    const block = new HclBlock(type, labels);
    this.items.push({ kind: "block", block });
    return block;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  render(indent = 0): string {
    const pad = " ".repeat(indent);
    const header = [this.type, ...this.labels.map(quote)].join(" ");
    if (this.items.length === 0) return `${pad}${header} {}`;

    const lines = this.items.map((item) =>
      item.kind === "attribute"
        ? `${pad}  ${item.name} = ${formatValue(item.value, indent + 2)}`
        : item.block.render(indent + 2),
    );
    return `${pad}${header} {\n${lines.join("\n")}\n${pad}}`;
  }
}

/**
 * Render blocks as a file body: one blank line between blocks, trailing newline.
 */
export function renderBlocks(blocks: readonly HclBlock[]): string {
  if (blocks.length === 0) return "";
  return `${blocks.map((b) => b.render()).join("\n\n")}\n`;
}

/**
 * Render top-level `name = value` lines, as in a `.tfvars` file.
 */
export function renderAttributes(values: ReadonlyArray<readonly [string, HclValue]>): string {
  if (values.length === 0) return "";
  return `${values.map(([name, value]) => `${name} = ${formatValue(value)}`).join("\n")}\n`;
}

// =============================================================================
// Names
// =============================================================================

/**
 * Turn a node id into a Terraform resource name: characters outside
 * `[A-Za-z0-9_]` become `_`, and a leading digit gets a `_` prefix.
 */
export function sanitizeName(id: string): string {
  const name = id.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(name) ? `_${name}` : name;
}
