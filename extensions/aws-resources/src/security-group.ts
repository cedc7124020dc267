/**
 * aws_security_group — rules from `properties.ingress` / `properties.egress`.
 *
 * Without an `egress` property the group gets the usual allow-all egress rule.
 */

import {
  diagnosticError,
  diagnosticWarning,
  getList,
  getString,
  hasProperty,
  isJsonArray,
  isJsonObject,
  reference,
  type Diagnostic,
  type Diagram,
  type DiagramNode,
  type HclBlock,
  type JsonObject,
  type ReferenceLookup,
  type ResourceHandler,
} from "../../../src/plugin-sdk/index.js";
import { renderResource, resourceBlock, sourceAddresses, tagsWithName } from "./shared.js";

type Rule = JsonObject;

function rules(node: DiagramNode, key: "ingress" | "egress"): Rule[] {
  return getList(node.properties, key).filter(isJsonObject);
}

function numberField(rule: Rule, key: string): number | undefined {
  const value = rule[key];
  return typeof value === "number" ? Math.trunc(value) : undefined;
}

function cidrBlocks(rule: Rule): string[] {
  const value = rule.cidr_blocks;
  return isJsonArray(value) ? value.filter((c): c is string => typeof c === "string") : [];
}

function appendRule(parent: HclBlock, type: "ingress" | "egress", rule: Rule): void {
  const block = parent.appendBlock(type);
  const from = numberField(rule, "from_port");
  const to = numberField(rule, "to_port");
  if (from !== undefined) block.set("from_port", from);
  if (to !== undefined) block.set("to_port", to);
  if (typeof rule.protocol === "string") block.set("protocol", rule.protocol);
  const cidrs = cidrBlocks(rule);
  if (cidrs.length > 0) block.set("cidr_blocks", cidrs);
  if (typeof rule.description === "string") block.set("description", rule.description);
}

function opensSshToWorld(rule: Rule): boolean {
  const from = numberField(rule, "from_port") ?? 0;
  const to = numberField(rule, "to_port") ?? from;
  const protocol = typeof rule.protocol === "string" ? rule.protocol : "";
  const tcp = protocol === "tcp" || protocol === "-1" || protocol === "6";
  return tcp && from <= 22 && 22 <= to && cidrBlocks(rule).includes("0.0.0.0/0");
}

export const securityGroupHandler: ResourceHandler = {
  kind: "security_group",
  terraformType: "aws_security_group",

  validate(node: DiagramNode) {
    const errors: Diagnostic[] = [];
    const warnings: Diagnostic[] = [];
    if (getString(node.properties, "name") === "" && node.label === "") {
      errors.push(
        diagnosticError("validation_error", "name or label is required", {
          nodeId: node.id,
          suggestion: "Set properties.name or node.label",
        }),
      );
    }
    if (rules(node, "ingress").some(opensSshToWorld)) {
      warnings.push(
        diagnosticWarning("validation_error", "ingress allows SSH (port 22) from 0.0.0.0/0", {
          nodeId: node.id,
          suggestion: "Restrict cidr_blocks to known address ranges",
        }),
      );
    }
    return { errors, warnings };
  },

  generate(node: DiagramNode, diagram: Diagram, refs: ReferenceLookup) {
    const p = node.properties;
    const block = resourceBlock("aws_security_group", node)
      .setString("name", getString(p, "name") || node.label)
      .setString("description", getString(p, "description"));

    const [vpc] = sourceAddresses(node, diagram, refs, "contains");
    if (vpc !== undefined) block.set("vpc_id", reference(vpc, "id"));

    for (const rule of rules(node, "ingress")) appendRule(block, "ingress", rule);
    if (hasProperty(p, "egress")) {
      for (const rule of rules(node, "egress")) appendRule(block, "egress", rule);
    } else {
      appendRule(block, "egress", { from_port: 0, to_port: 0, protocol: "-1", cidr_blocks: ["0.0.0.0/0"] });
    }

    block.setMap("tags", tagsWithName(node));
    return renderResource(block);
  },
};
