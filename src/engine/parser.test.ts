import { describe, expect, it } from "vitest";
import { diagram, edge, node } from "../../test/fixtures.js";
import { createDefaultRegistry } from "../defaults.js";
import type { Diagram, DiagramNode } from "../diagram/types.js";
import { diagnosticError, diagnosticWarning } from "../errors.js";
import { createLogger, MemoryTransport } from "../logging/logger.js";
import { HandlerRegistry } from "../registry/registry.js";
import type { ReferenceLookup, ResourceHandler } from "../registry/types.js";
import { DiagramParser } from "./parser.js";
import type { EnginePhase } from "./types.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const VPC_BLOCK = [
  'resource "aws_vpc" "vpc" {',
  '  cidr_block = "10.0.0.0/16"',
  "  enable_dns_hostnames = false",
  "  enable_dns_support = true",
  "  tags = {",
  '    Name = "Main VPC"',
  "  }",
  "}",
].join("\n");

const SUBNET_BLOCK = [
  'resource "aws_subnet" "subnet" {',
  "  vpc_id = aws_vpc.vpc.id",
  '  cidr_block = "10.0.1.0/24"',
  '  availability_zone = "us-east-1a"',
  "}",
].join("\n");

function network(): Diagram {
  return diagram(
    [
      node("subnet", "subnet", { cidr_block: "10.0.1.0/24", availability_zone: "us-east-1a" }),
      node("vpc", "vpc", { cidr_block: "10.0.0.0/16" }, "Main VPC"),
    ],
    [edge("vpc", "subnet", "contains")],
  );
}

/** Handler that renders a placeholder block after `delay(node)` ms. */
function delayedHandler(kind: string, delay: (node: DiagramNode) => number): ResourceHandler {
  return {
    kind,
    terraformType: `test_${kind}`,
    validate: () => ({ errors: [], warnings: [] }),
    async generate(n: DiagramNode, _diagram: Diagram, refs: ReferenceLookup) {
      await sleep(delay(n));
      return `resource "test_${kind}" "${n.id}" {\n  refs = ${refs.size}\n}\n`;
    },
  };
}

describe("DiagramParser", () => {
  it("generates a VPC and the subnet it contains", async () => {
    const phases: EnginePhase[] = [];
    const parser = new DiagramParser(createDefaultRegistry(), { onPhase: (p) => phases.push(p) });
    const result = await parser.parse(network());

    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
    expect(Object.keys(result.files)).toEqual(["versions.tf", "variables.tf", "main.tf", "terraform.tfvars"]);
    expect(result.files["main.tf"]).toBe(`${VPC_BLOCK}\n\n${SUBNET_BLOCK}\n`);
    expect(result.files["terraform.tfvars"]).toBe('aws_region = "us-east-1"\n');
    expect(phases).toEqual([
      { name: "validating" },
      { name: "resolving" },
      { name: "generating", tier: 0, nodeIds: ["vpc"] },
      { name: "generating", tier: 1, nodeIds: ["subnet"] },
      { name: "assembling" },
      { name: "done" },
    ]);
  });

  it("produces identical output on repeated runs", async () => {
    const parser = new DiagramParser(createDefaultRegistry());
    const first = await parser.parse(network());
    const second = await parser.parse(network());
    expect(second).toEqual(first);
  });

  it("honours emitTfvars, emitOutputs and region", async () => {
    const parser = new DiagramParser(createDefaultRegistry(), {
      emitTfvars: false,
      emitOutputs: true,
      region: "eu-west-1",
    });
    const result = await parser.parse(network());

    expect(result.files["terraform.tfvars"]).toBeUndefined();
    expect(result.files["variables.tf"]).toContain('default = "eu-west-1"');
    expect(result.files["outputs.tf"]).toBe(
      [
        'output "vpc_id" {',
        '  description = "ID of vpc"',
        "  value = aws_vpc.vpc.id",
        "}",
        "",
        'output "subnet_id" {',
        '  description = "ID of subnet"',
        "  value = aws_subnet.subnet.id",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("reports a missing vpc cidr as one validation error and emits nothing", async () => {
    const phases: EnginePhase[] = [];
    const parser = new DiagramParser(createDefaultRegistry(), { onPhase: (p) => phases.push(p) });
    const result = await parser.parse(
      diagram([node("vpc", "vpc", {}), node("logs", "s3_bucket", { bucket: "logs", versioning: true })]),
    );

    expect(result.success).toBe(false);
    expect(result.files).toEqual({});
    expect(result.errors).toEqual([
      {
        type: "validation_error",
        severity: "error",
        nodeId: "vpc",
        message: "cidr_block is required",
        suggestion: "Set properties.cidr_block (e.g. 10.0.0.0/16)",
      },
    ]);
    expect(phases.at(-1)).toEqual({ name: "failed", reason: "generation" });
  });

  it("stops at diagram validation", async () => {
    const phases: EnginePhase[] = [];
    const parser = new DiagramParser(createDefaultRegistry(), { onPhase: (p) => phases.push(p) });
    const result = await parser.parse(diagram([node("a", "vpc"), node("a", "vpc")], [], { version: "" }));

    expect(result.success).toBe(false);
    expect(result.errors.map((e) => e.message)).toEqual(["metadata.version is required", "duplicate node id: a"]);
    expect(phases).toEqual([{ name: "validating" }, { name: "failed", reason: "schema" }]);
  });

  it("reports a cycle as a single dependency error", async () => {
    const phases: EnginePhase[] = [];
    const parser = new DiagramParser(createDefaultRegistry(), { onPhase: (p) => phases.push(p) });
    const result = await parser.parse(
      diagram(
        [node("a", "vpc", { cidr_block: "10.0.0.0/16" }), node("b", "subnet", { cidr_block: "10.0.1.0/24" })],
        [edge("a", "b"), edge("b", "a")],
      ),
    );

    expect(result.success).toBe(false);
    expect(result.files).toEqual({});
    expect(result.errors).toEqual([
      {
        type: "dependency_error",
        severity: "error",
        message: "dependency cycle detected among nodes: a, b",
        suggestion: "Remove circular edges or fix node references",
      },
    ]);
    expect(phases).toEqual([{ name: "validating" }, { name: "resolving" }, { name: "failed", reason: "dependency" }]);
  });

  it("reports unsupported kinds without stopping other nodes", async () => {
    const registry = new HandlerRegistry();
    registry.registerHandler(delayedHandler("box", () => 0));
    registry.registerHandler(delayedHandler("crate", () => 0));
    const generated: string[] = [];
    registry.registerHandler({
      kind: "probe",
      validate: () => ({ errors: [], warnings: [] }),
      generate: (n) => {
        generated.push(n.id);
        return "";
      },
    });

    const result = await new DiagramParser(registry).parse(
      diagram([node("ufo", "teleporter"), node("p", "probe")], [edge("ufo", "p")]),
    );

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      {
        type: "unsupported_kind",
        severity: "error",
        nodeId: "ufo",
        message: "unsupported resource type: teleporter",
        suggestion: "Use one of: box, crate, probe",
      },
    ]);
    expect(generated).toEqual(["p"]);
  });

  it("collects errors from every tier in declaration order", async () => {
    const registry = new HandlerRegistry();
    registry.registerHandler({
      kind: "strict",
      validate: (n) => ({
        errors: [diagnosticError("validation_error", `bad ${n.id}`)],
        warnings: [diagnosticWarning("validation_error", `meh ${n.id}`)],
      }),
      generate: () => "",
    });
    registry.registerHandler({
      kind: "broken",
      validate: () => {
        throw new Error("validator crashed");
      },
      generate: async () => {
        throw new Error("template failed");
      },
    });

    const result = await new DiagramParser(registry, { maxParallel: 4 }).parse(
      diagram(
        [node("b1", "broken"), node("s1", "strict"), node("s2", "strict"), node("b2", "broken")],
        [edge("s1", "b2"), edge("s2", "b2")],
      ),
    );

    expect(result.success).toBe(false);
    expect(result.errors.map((e) => [e.nodeId, e.type, e.message])).toEqual([
      ["b1", "validation_error", "validator for broken failed: validator crashed"],
      ["b1", "generation_error", "template failed"],
      ["s1", "validation_error", "bad s1"],
      ["s2", "validation_error", "bad s2"],
      ["b2", "validation_error", "validator for broken failed: validator crashed"],
      ["b2", "generation_error", "template failed"],
    ]);
    expect(result.warnings.map((w) => [w.nodeId, w.severity, w.message])).toEqual([
      ["s1", "warning", "meh s1"],
      ["s2", "warning", "meh s2"],
    ]);
  });

  it("keeps warnings on a successful run", async () => {
    const result = await new DiagramParser(createDefaultRegistry()).parse(
      diagram([node("assets", "s3_bucket", { bucket: "assets" })]),
    );
    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([
      {
        type: "validation_error",
        severity: "warning",
        nodeId: "assets",
        message: "bucket versioning is disabled",
        suggestion: "Set properties.versioning to true",
      },
    ]);
  });

  it("orders artifacts by declaration whatever the completion order", async () => {
    const ids = ["n0", "n1", "n2", "n3", "n4", "n5", "n6", "n7"];
    const registry = new HandlerRegistry();
    // Earlier nodes finish last.
    registry.registerHandler(delayedHandler("slow", (n) => (ids.length - ids.indexOf(n.id)) * 3));
    const d = diagram(
      [...ids.map((id) => node(id, "slow")), node("tail", "slow")],
      ids.map((id) => edge(id, "tail")),
    );

    const serial = await new DiagramParser(registry, { maxParallel: 1 }).parse(d);
    const parallel = await new DiagramParser(registry, { maxParallel: 8 }).parse(d);

    expect(parallel).toEqual(serial);
    const main = serial.files["main.tf"] ?? "";
    const order = [...main.matchAll(/resource "test_slow" "(\w+)"/g)].map((m) => m[1]);
    expect(order).toEqual([...ids, "tail"]);
    // Nodes in one tier see only addresses from earlier tiers.
    expect(main).toContain('resource "test_slow" "n7" {\n  refs = 0\n}');
    expect(main).toContain('resource "test_slow" "tail" {\n  refs = 8\n}');
  });

  it("hides same-tier addresses and exposes earlier ones", async () => {
    const seen = new Map<string, string[]>();
    const registry = new HandlerRegistry();
    registry.registerHandler({
      kind: "spy",
      terraformType: "test_spy",
      validate: () => ({ errors: [], warnings: [] }),
      async generate(n, _d, refs) {
        await sleep(n.id === "a" ? 0 : 10);
        seen.set(
          n.id,
          ["a", "b", "c"].filter((id) => refs.has(id)),
        );
        return `resource "test_spy" "${n.id}" {}`;
      },
    });

    const result = await new DiagramParser(registry, { maxParallel: 2 }).parse(
      diagram([node("a", "spy"), node("b", "spy"), node("c", "spy")], [edge("a", "c"), edge("b", "c")]),
    );

    expect(result.success).toBe(true);
    expect(seen.get("a")).toEqual([]);
    expect(seen.get("b")).toEqual([]);
    expect(seen.get("c")).toEqual(["a", "b"]);
  });

  it("does not give an address to a node that generated nothing", async () => {
    const registry = new HandlerRegistry();
    let visible: string | undefined = "unset";
    registry.registerHandler({
      kind: "empty",
      validate: () => ({ errors: [], warnings: [] }),
      generate: () => "",
    });
    registry.registerHandler({
      kind: "reader",
      validate: () => ({ errors: [], warnings: [] }),
      generate: (_n, _d, refs) => {
        visible = refs.get("e");
        return 'resource "test_reader" "r" {}';
      },
    });

    const result = await new DiagramParser(registry).parse(
      diagram([node("e", "empty"), node("r", "reader")], [edge("e", "r")]),
    );
    expect(result.success).toBe(true);
    expect(visible).toBeUndefined();
    expect(result.files["main.tf"]).toBe('resource "test_reader" "r" {}\n');
  });

  it("logs the run with a run id", async () => {
    const transport = new MemoryTransport();
    const logger = createLogger("diagram-tf", { level: "debug", transports: [transport] });
    await new DiagramParser(createDefaultRegistry(), { logger }).parse(network());

    expect(transport.messages("info")).toEqual(["Parsing diagram", "Diagram parsed"]);
    const runIds = new Set(transport.entries.map((e) => e.context?.runId));
    expect(runIds.size).toBe(1);
    expect([...runIds][0]).toMatch(/^[0-9a-f]{8}$/);
  });

  it("rejects node ids that sanitize to an address already in use", async () => {
    const result = await new DiagramParser(createDefaultRegistry()).parse(
      diagram(
        [
          node("app-vpc", "vpc", { cidr_block: "10.0.0.0/16" }),
          node("app_vpc", "vpc", { cidr_block: "10.1.0.0/16" }),
          node("sn", "subnet", { cidr_block: "10.1.1.0/24" }),
        ],
        [edge("app_vpc", "sn", "contains")],
      ),
    );

    expect(result.success).toBe(false);
    expect(result.files).toEqual({});
    expect(result.errors).toEqual([
      {
        type: "generation_error",
        severity: "error",
        nodeId: "app_vpc",
        message: "address aws_vpc.app_vpc is already used by node app-vpc",
        suggestion: "Rename the node so its id stays unique after sanitizing",
      },
    ]);
  });

  it("detects address clashes across tiers", async () => {
    const result = await new DiagramParser(createDefaultRegistry()).parse(
      diagram(
        [node("1a", "vpc", { cidr_block: "10.0.0.0/16" }), node("_1a", "vpc", { cidr_block: "10.1.0.0/16" })],
        [edge("_1a", "1a")],
      ),
    );

    expect(result.errors.map((e) => [e.nodeId, e.message])).toEqual([
      ["1a", "address aws_vpc._1a is already used by node _1a"],
    ]);
  });

  it("exposes the effective concurrency", () => {
    expect(new DiagramParser(new HandlerRegistry(), { maxParallel: 3 }).concurrency).toBe(3);
    expect(new DiagramParser(new HandlerRegistry(), { maxParallel: 500 }).concurrency).toBe(32);
  });
});
