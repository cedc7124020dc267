import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  // Source (src/) and build (dist/src/) layouts keep package.json at different depths.
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg = require(candidate) as { name?: string; version?: string };
      if (pkg.name === "diagram-tf" && pkg.version) return pkg.version;
    } catch {
      continue;
    }
  }
  return null;
}

// Single source of truth for the current diagram-tf version.
export const VERSION = process.env.DIAGRAM_TF_VERSION || readVersionFromPackageJson() || "0.0.0";
