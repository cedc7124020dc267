import { describe, expect, it } from "vitest";
import { resolveTerraformType, terraformAddress } from "./addresses.js";

describe("resolveTerraformType", () => {
  it("prefers the handler's declared type", () => {
    expect(resolveTerraformType("vpc", { terraformType: "aws_default_vpc" })).toBe("aws_default_vpc");
  });

  it("falls back to known kinds, then aws_<kind>", () => {
    expect(resolveTerraformType("ec2_instance")).toBe("aws_instance");
    expect(resolveTerraformType("rds_instance", {})).toBe("aws_db_instance");
    expect(resolveTerraformType("sqs_queue")).toBe("aws_sqs_queue");
    expect(resolveTerraformType("constructor")).toBe("aws_constructor");
  });
});

describe("terraformAddress", () => {
  it("joins the type and the sanitized node id", () => {
    expect(terraformAddress("aws_vpc", "main-vpc")).toBe("aws_vpc.main_vpc");
  });
});
