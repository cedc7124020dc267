/**
 * aws_vpc
 */

import {
  getBoolean,
  getString,
  hasProperty,
  type DiagramNode,
  type ResourceHandler,
} from "../../../src/plugin-sdk/index.js";
import { present, renderResource, requireString, resourceBlock, tagsWithName } from "./shared.js";

export const vpcHandler: ResourceHandler = {
  kind: "vpc",
  terraformType: "aws_vpc",

  validate(node: DiagramNode) {
    return {
      errors: present([requireString(node, "cidr_block", "10.0.0.0/16")]),
      warnings: [],
    };
  },

  generate(node: DiagramNode) {
    const p = node.properties;
    const block = resourceBlock("aws_vpc", node)
      .setString("cidr_block", getString(p, "cidr_block"))
      .set("enable_dns_hostnames", getBoolean(p, "enable_dns_hostnames"))
      // AWS enables DNS support unless told otherwise.
      .set("enable_dns_support", hasProperty(p, "enable_dns_support") ? getBoolean(p, "enable_dns_support") : true)
      .setMap("tags", tagsWithName(node));
    return renderResource(block);
  },
};
