/**
 * Boilerplate sections: provider requirements, input variables, outputs, tfvars.
 */

import type { DiagramMetadata } from "../diagram/types.js";
import { HclBlock, expr, reference, renderAttributes, renderBlocks, type HclValue } from "./hcl.js";

export const DEFAULT_REGION = "us-east-1";
export const REQUIRED_TERRAFORM_VERSION = ">= 1.0";
export const AWS_PROVIDER_SOURCE = "hashicorp/aws";
export const AWS_PROVIDER_VERSION = "~> 5.0";

/**
 * `versions.tf`: the terraform settings block and the AWS provider.
 */
export function versionsTf(): string {
  const terraform = new HclBlock("terraform").set("required_version", REQUIRED_TERRAFORM_VERSION);
  terraform.appendBlock("required_providers").set("aws", {
    source: AWS_PROVIDER_SOURCE,
    version: AWS_PROVIDER_VERSION,
  });
  const provider = new HclBlock("provider", ["aws"]).set("region", expr("var.aws_region"));
  return renderBlocks([terraform, provider]);
}

/**
 * `variables.tf`: `aws_region`, plus `environment` when the diagram names one.
 */
export function variablesTf(metadata: DiagramMetadata, region: string = DEFAULT_REGION): string {
  const blocks = [
    new HclBlock("variable", ["aws_region"])
      .set("description", "AWS region")
      .set("type", expr("string"))
      .set("default", region),
  ];
  if (metadata.environment !== "") {
    blocks.push(
      new HclBlock("variable", ["environment"])
        .set("description", "Deployment environment")
        .set("type", expr("string"))
        .set("default", metadata.environment),
    );
  }
  return renderBlocks(blocks);
}

export type OutputSource = {
  /** Terraform resource name (the sanitized node id) */
  name: string;
  address: string;
  nodeId: string;
};

/**
 * `outputs.tf`: one `<name>_id` output per generated resource.
 */
export function outputsTf(sources: readonly OutputSource[]): string {
  return renderBlocks(
    sources.map((s) =>
      new HclBlock("output", [`${s.name}_id`])
        .set("description", `ID of ${s.nodeId}`)
        .set("value", reference(s.address, "id")),
    ),
  );
}

/**
 * `terraform.tfvars` values taken from the diagram metadata.
 */
export function tfvarsFromMetadata(metadata: DiagramMetadata, region: string = DEFAULT_REGION): string {
  const values: Array<[string, HclValue]> = [["aws_region", region]];
  if (metadata.environment !== "") values.push(["environment", metadata.environment]);
  return renderAttributes(values);
}
