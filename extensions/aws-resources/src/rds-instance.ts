/**
 * aws_db_instance — subnet group from a `contains` edge, security groups from `connects_to`.
 */

import {
  diagnosticError,
  diagnosticWarning,
  getBoolean,
  getInteger,
  getString,
  reference,
  type Diagnostic,
  type Diagram,
  type DiagramNode,
  type ReferenceLookup,
  type ResourceHandler,
} from "../../../src/plugin-sdk/index.js";
import {
  present,
  referenceList,
  renderResource,
  requireString,
  resourceBlock,
  sourceAddresses,
  tagsWithName,
} from "./shared.js";

export const rdsInstanceHandler: ResourceHandler = {
  kind: "rds_instance",
  terraformType: "aws_db_instance",

  validate(node: DiagramNode) {
    const p = node.properties;
    const errors = present([
      requireString(node, "engine", "postgres"),
      requireString(node, "instance_class", "db.t3.micro"),
    ]);
    if (getInteger(p, "allocated_storage") <= 0) {
      errors.push(
        diagnosticError("validation_error", "allocated_storage is required", {
          nodeId: node.id,
          suggestion: "Set properties.allocated_storage (GB)",
        }),
      );
    }
    const warnings: Diagnostic[] = [];
    if (getString(p, "password") !== "") {
      warnings.push(
        diagnosticWarning("validation_error", "password is stored in plain text in the generated configuration", {
          nodeId: node.id,
          suggestion: "Use manage_master_user_password or a variable instead of properties.password",
        }),
      );
    }
    return { errors, warnings };
  },

  generate(node: DiagramNode, diagram: Diagram, refs: ReferenceLookup) {
    const p = node.properties;
    const block = resourceBlock("aws_db_instance", node)
      .setString("engine", getString(p, "engine"))
      .setString("engine_version", getString(p, "engine_version"))
      .setString("instance_class", getString(p, "instance_class"))
      .set("allocated_storage", getInteger(p, "allocated_storage"))
      .setString("storage_type", getString(p, "storage_type"))
      .setString("db_name", getString(p, "db_name"))
      .setString("username", getString(p, "username"))
      .setString("password", getString(p, "password"));
    if (getBoolean(p, "skip_final_snapshot")) block.set("skip_final_snapshot", true);
    const retention = getInteger(p, "backup_retention_period");
    if (retention > 0) block.set("backup_retention_period", retention);
    block.set("multi_az", getBoolean(p, "multi_az"));

    const [subnetGroup] = sourceAddresses(node, diagram, refs, "contains", "db_subnet_group");
    if (subnetGroup !== undefined) block.set("db_subnet_group_name", reference(subnetGroup, "name"));

    const groups = sourceAddresses(node, diagram, refs, "connects_to", "security_group");
    if (groups.length > 0) block.set("vpc_security_group_ids", referenceList(groups, "id"));

    block.setMap("tags", tagsWithName(node));
    return renderResource(block);
  },
};
