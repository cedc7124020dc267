/**
 * Symbolic addresses for generated resources.
 */

import type { ResourceHandler } from "../registry/types.js";
import { sanitizeName } from "./hcl.js";

/** Terraform resource type for the resource kinds diagram-tf ships handlers for. */
const KIND_TERRAFORM_TYPES = new Map<string, string>([
  ["vpc", "aws_vpc"],
  ["subnet", "aws_subnet"],
  ["security_group", "aws_security_group"],
  ["ec2_instance", "aws_instance"],
  ["lambda_function", "aws_lambda_function"],
  ["s3_bucket", "aws_s3_bucket"],
  ["rds_instance", "aws_db_instance"],
]);

/**
 * Resolve the Terraform type for a kind: the handler's own declaration wins,
 * then the known-kind table, then `aws_<kind>`.
 */
export function resolveTerraformType(kind: string, handler?: Pick<ResourceHandler, "terraformType">): string {
  return handler?.terraformType ?? KIND_TERRAFORM_TYPES.get(kind) ?? `aws_${kind}`;
}

export function terraformAddress(terraformType: string, nodeId: string): string {
  return `${terraformType}.${sanitizeName(nodeId)}`;
}
