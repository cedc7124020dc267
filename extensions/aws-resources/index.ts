/**
 * AWS resources — built-in handlers for the common AWS resource kinds.
 */

import type { DiagramTfPlugin, DiagramTfPluginApi, ResourceHandler } from "../../src/plugin-sdk/index.js";
import { ec2InstanceHandler } from "./src/ec2-instance.js";
import { lambdaFunctionHandler } from "./src/lambda-function.js";
import { rdsInstanceHandler } from "./src/rds-instance.js";
import { s3BucketHandler } from "./src/s3-bucket.js";
import { securityGroupHandler } from "./src/security-group.js";
import { subnetHandler } from "./src/subnet.js";
import { vpcHandler } from "./src/vpc.js";

export const awsResourceHandlers: readonly ResourceHandler[] = [
  vpcHandler,
  subnetHandler,
  securityGroupHandler,
  ec2InstanceHandler,
  lambdaFunctionHandler,
  s3BucketHandler,
  rdsInstanceHandler,
];

const awsResourcesPlugin: DiagramTfPlugin = {
  id: "aws-resources",
  name: "AWS Resources",
  register(api: DiagramTfPluginApi) {
    for (const handler of awsResourceHandlers) {
      api.registerHandler(handler);
    }
    api.logger?.debug(`Registered ${awsResourceHandlers.length} AWS resource handlers`);
  },
};

export default awsResourcesPlugin;
