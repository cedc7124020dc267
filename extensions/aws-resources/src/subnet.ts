/**
 * aws_subnet — placed in the VPC that `contains` it.
 */

import {
  getBoolean,
  getString,
  reference,
  type Diagram,
  type DiagramNode,
  type ReferenceLookup,
  type ResourceHandler,
} from "../../../src/plugin-sdk/index.js";
import { present, renderResource, requireString, resourceBlock, sourceAddresses, tagsWithName } from "./shared.js";

export const subnetHandler: ResourceHandler = {
  kind: "subnet",
  terraformType: "aws_subnet",

  validate(node: DiagramNode) {
    return {
      errors: present([requireString(node, "cidr_block", "10.0.1.0/24")]),
      warnings: [],
    };
  },

  generate(node: DiagramNode, diagram: Diagram, refs: ReferenceLookup) {
    const p = node.properties;
    const block = resourceBlock("aws_subnet", node);

    const [vpc] = sourceAddresses(node, diagram, refs, "contains");
    if (vpc !== undefined) block.set("vpc_id", reference(vpc, "id"));

    block
      .setString("cidr_block", getString(p, "cidr_block"))
      .setString("availability_zone", getString(p, "availability_zone"));
    if (getBoolean(p, "map_public_ip_on_launch")) block.set("map_public_ip_on_launch", true);
    block.setMap("tags", tagsWithName(node));
    return renderResource(block);
  },
};
