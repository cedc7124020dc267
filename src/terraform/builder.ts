/**
 * Terraform output assembly.
 *
 * Collects the boilerplate sections and the per-node resource blocks and merges
 * them into named files in a fixed order.
 */

export const OUTPUT_FILES = {
  versions: "versions.tf",
  variables: "variables.tf",
  main: "main.tf",
  outputs: "outputs.tf",
  tfvars: "terraform.tfvars",
} as const;

export type OutputFileName = (typeof OUTPUT_FILES)[keyof typeof OUTPUT_FILES];

export type TerraformFiles = Partial<Record<OutputFileName, string>>;

export class TerraformBuilder {
  private resources: string[] = [];
  private versions = "";
  private variables = "";
  private outputs = "";
  private tfvars = "";

  constructor(private readonly emitTfvars: boolean) {}

  /**
   * Append one resource artifact; empty artifacts are ignored.
   */
  addResource(block: string): this {
    const trimmed = block.trimEnd();
    if (trimmed !== "") this.resources.push(trimmed);
    return this;
  }

  setVersions(content: string): this {
    this.versions = content;
    return this;
  }

  setVariables(content: string): this {
    this.variables = content;
    return this;
  }

  setOutputs(content: string): this {
    this.outputs = content;
    return this;
  }

  setTfvars(content: string): this {
    this.tfvars = content;
    return this;
  }

  get resourceCount(): number {
    return this.resources.length;
  }

  /**
   * File name → content, in merge order. Empty sections are left out;
   * `main.tf` is present whenever at least one resource was added.
   */
  build(): TerraformFiles {
    const files: TerraformFiles = {};
    if (this.versions !== "") files[OUTPUT_FILES.versions] = this.versions;
    if (this.variables !== "") files[OUTPUT_FILES.variables] = this.variables;
    if (this.resources.length > 0) files[OUTPUT_FILES.main] = `${this.resources.join("\n\n")}\n`;
    if (this.outputs !== "") files[OUTPUT_FILES.outputs] = this.outputs;
    if (this.emitTfvars && this.tfvars !== "") files[OUTPUT_FILES.tfvars] = this.tfvars;
    return files;
  }
}

/**
 * `[name, content]` pairs in merge order.
 */
export function fileEntries(files: Readonly<TerraformFiles>): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const [name, content] of Object.entries(files)) {
    if (content !== undefined) entries.push([name, content]);
  }
  return entries;
}
