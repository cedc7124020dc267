/**
 * aws_instance — subnet from a `contains` edge, security groups from `connects_to`.
 */

import {
  getString,
  reference,
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

export const ec2InstanceHandler: ResourceHandler = {
  kind: "ec2_instance",
  terraformType: "aws_instance",

  validate(node: DiagramNode) {
    return {
      errors: present([requireString(node, "ami"), requireString(node, "instance_type", "t3.micro")]),
      warnings: [],
    };
  },

  generate(node: DiagramNode, diagram: Diagram, refs: ReferenceLookup) {
    const p = node.properties;
    const block = resourceBlock("aws_instance", node)
      .setString("ami", getString(p, "ami"))
      .setString("instance_type", getString(p, "instance_type"))
      .setString("key_name", getString(p, "key_name"));

    const [subnet] = sourceAddresses(node, diagram, refs, "contains", "subnet");
    if (subnet !== undefined) block.set("subnet_id", reference(subnet, "id"));

    const groups = sourceAddresses(node, diagram, refs, "connects_to", "security_group");
    if (groups.length > 0) block.set("vpc_security_group_ids", referenceList(groups, "id"));

    block.setMap("tags", tagsWithName(node));
    return renderResource(block);
  },
};
