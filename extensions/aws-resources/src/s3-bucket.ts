/**
 * aws_s3_bucket, plus aws_s3_bucket_public_access_block when public access is blocked.
 */

import {
  HclBlock,
  diagnosticError,
  diagnosticWarning,
  getBoolean,
  getString,
  reference,
  sanitizeName,
  type Diagnostic,
  type DiagramNode,
  type ResourceHandler,
} from "../../../src/plugin-sdk/index.js";
import { renderResource, resourceBlock, tagsWithName } from "./shared.js";

export const s3BucketHandler: ResourceHandler = {
  kind: "s3_bucket",
  terraformType: "aws_s3_bucket",

  validate(node: DiagramNode) {
    const errors: Diagnostic[] = [];
    const warnings: Diagnostic[] = [];
    if (getString(node.properties, "bucket") === "" && node.label === "") {
      errors.push(
        diagnosticError("validation_error", "bucket name or label is required", {
          nodeId: node.id,
          suggestion: "Set properties.bucket or node.label",
        }),
      );
    }
    if (!getBoolean(node.properties, "versioning")) {
      warnings.push(
        diagnosticWarning("validation_error", "bucket versioning is disabled", {
          nodeId: node.id,
          suggestion: "Set properties.versioning to true",
        }),
      );
    }
    return { errors, warnings };
  },

  generate(node: DiagramNode) {
    const p = node.properties;
    const bucket = resourceBlock("aws_s3_bucket", node).setString(
      "bucket",
      getString(p, "bucket") || node.label,
    );
    if (getBoolean(p, "versioning")) {
      bucket.appendBlock("versioning").set("enabled", true);
    }
    bucket.setMap("tags", tagsWithName(node));

    if (!getBoolean(p, "block_public_acls")) return renderResource(bucket);

    const name = sanitizeName(node.id);
    const publicAccess = new HclBlock("resource", ["aws_s3_bucket_public_access_block", name])
      .set("bucket", reference(`aws_s3_bucket.${name}`, "id"))
      .set("block_public_acls", true)
      .set("block_public_policy", true)
      .set("ignore_public_acls", true)
      .set("restrict_public_buckets", true);
    return renderResource(bucket, publicAccess);
  },
};
