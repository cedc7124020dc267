import { describe, expect, it } from "vitest";
import { HclBlock, expr, formatValue, quote, reference, renderAttributes, renderBlocks, sanitizeName } from "./hcl.js";

describe("quote", () => {
  it("escapes quotes, backslashes and control characters", () => {
    expect(quote('say "hi"\\now\n')).toBe('"say \\"hi\\"\\\\now\\n"');
    expect(quote("a\tb\rc")).toBe('"a\\tb\\rc"');
  });

  it("escapes template sequences", () => {
    expect(quote("${var.x}")).toBe('"$${var.x}"');
    expect(quote("%{ if true }")).toBe('"%%{ if true }"');
  });
});

describe("formatValue", () => {
  it("formats scalars", () => {
    expect(formatValue("x")).toBe('"x"');
    expect(formatValue(42)).toBe("42");
    expect(formatValue(Number.NaN)).toBe("null");
    expect(formatValue(false)).toBe("false");
    expect(formatValue(null)).toBe("null");
    expect(formatValue(expr("var.aws_region"))).toBe("var.aws_region");
  });

  it("formats lists inline", () => {
    expect(formatValue(["a", 1, reference("aws_vpc.main", "id")])).toBe('["a", 1, aws_vpc.main.id]');
    expect(formatValue([])).toBe("[]");
  });

  it("formats objects with sorted keys and quotes non-identifier keys", () => {
    expect(formatValue({ b: "2", a: "1", "my key": "3" })).toBe('{\n  a = "1"\n  b = "2"\n  "my key" = "3"\n}');
    expect(formatValue({})).toBe("{}");
  });
});

describe("HclBlock", () => {
  it("renders attributes in insertion order with nested maps indented", () => {
    const block = new HclBlock("resource", ["aws_vpc", "main"])
      .set("cidr_block", "10.0.0.0/16")
      .set("tags", { Name: "Main" });

    expect(block.render()).toBe(
      ['resource "aws_vpc" "main" {', '  cidr_block = "10.0.0.0/16"', "  tags = {", '    Name = "Main"', "  }", "}"].join(
        "\n",
      ),
    );
  });

  it("replaces an attribute in place when set twice", () => {
    const block = new HclBlock("locals").set("a", 1).set("b", 2).set("a", 3);
    expect(block.render()).toBe("locals {\n  a = 3\n  b = 2\n}");
  });

  it("skips empty strings and empty maps", () => {
    const block = new HclBlock("resource", ["aws_s3_bucket", "b"]).setString("bucket", "").setMap("tags", {});
    expect(block.isEmpty).toBe(true);
    expect(block.render()).toBe('resource "aws_s3_bucket" "b" {}');
  });

  it("renders nested blocks", () => {
    const block = new HclBlock("resource", ["aws_security_group", "web"]);
    block.appendBlock("ingress").set("from_port", 443).set("cidr_blocks", ["0.0.0.0/0"]);
    expect(block.render()).toBe(
      [
        'resource "aws_security_group" "web" {',
        "  ingress {",
        "    from_port = 443",
        '    cidr_blocks = ["0.0.0.0/0"]',
        "  }",
        "}",
      ].join("\n"),
    );
  });
});

describe("renderBlocks", () => {
  it("separates blocks with a blank line and ends with a newline", () => {
    const out = renderBlocks([new HclBlock("a"), new HclBlock("b").set("x", true)]);
    expect(out).toBe("a {}\n\nb {\n  x = true\n}\n");
  });

  it("returns an empty string for no blocks", () => {
    expect(renderBlocks([])).toBe("");
  });
});

describe("renderAttributes", () => {
  it("renders one line per value", () => {
    expect(renderAttributes([["aws_region", "eu-west-1"], ["count", 2]])).toBe('aws_region = "eu-west-1"\ncount = 2\n');
  });
});

describe("sanitizeName", () => {
  it("replaces characters outside [A-Za-z0-9_]", () => {
    expect(sanitizeName("web-server.1")).toBe("web_server_1");
  });

  it("prefixes a leading digit", () => {
    expect(sanitizeName("1st")).toBe("_1st");
  });

  it("keeps valid names unchanged", () => {
    expect(sanitizeName("main_vpc")).toBe("main_vpc");
  });
});
