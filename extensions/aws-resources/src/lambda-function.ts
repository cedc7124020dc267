/**
 * aws_lambda_function
 */

import {
  getInteger,
  getString,
  getStringRecord,
  type DiagramNode,
  type ResourceHandler,
} from "../../../src/plugin-sdk/index.js";
import { present, renderResource, requireString, resourceBlock, tagsWithName } from "./shared.js";

export const DEFAULT_MEMORY_SIZE = 128;
export const DEFAULT_TIMEOUT = 3;

export const lambdaFunctionHandler: ResourceHandler = {
  kind: "lambda_function",
  terraformType: "aws_lambda_function",

  validate(node: DiagramNode) {
    return {
      errors: present([
        requireString(node, "runtime", "python3.12"),
        requireString(node, "handler", "index.handler"),
      ]),
      warnings: [],
    };
  },

  generate(node: DiagramNode) {
    const p = node.properties;
    const block = resourceBlock("aws_lambda_function", node)
      .setString("function_name", getString(p, "function_name") || node.label)
      .setString("runtime", getString(p, "runtime"))
      .setString("handler", getString(p, "handler"))
      .set("memory_size", getInteger(p, "memory_size") || DEFAULT_MEMORY_SIZE)
      .set("timeout", getInteger(p, "timeout") || DEFAULT_TIMEOUT)
      .setString("filename", getString(p, "filename"))
      .setString("role", getString(p, "role"));

    const variables = getStringRecord(p, "environment_variables");
    if (Object.keys(variables).length > 0) {
      block.appendBlock("environment").set("variables", variables);
    }

    block.setMap("tags", tagsWithName(node));
    return renderResource(block);
  },
};
