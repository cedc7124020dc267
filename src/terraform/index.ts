export * from "./hcl.js";
export * from "./templates.js";
export { TerraformBuilder, OUTPUT_FILES, fileEntries, type OutputFileName, type TerraformFiles } from "./builder.js";
export { resolveTerraformType, terraformAddress } from "./addresses.js";
