// Reads raw policy entries from a directory of JSON files.
//
// Files are read in name order. Each file holds one policy block or
// `{ "policies": [...] }`; entries are returned unadmitted so that one bad block
// cannot take its neighbours down with it.

import fs from "node:fs";
import path from "node:path";
import { splitPolicyFileV1 } from "@mapsexpr/policy-validator";
import { errorMessage } from "@mapsexpr/ruleset-kernel";

export type PolicySourceEntry =
  | { origin: string; raw: unknown }
  | { origin: string; loadError: string };

export function readPolicyDir(dir: string): PolicySourceEntry[] {
  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile() && d.name.endsWith(".json"))
    .map((d) => d.name)
    .sort();

  const out: PolicySourceEntry[] = [];
  for (const name of files) {
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(path.join(dir, name), "utf8"));
    } catch (err) {
      out.push({ origin: name, loadError: `POLICY_FILE_UNREADABLE: ${errorMessage(err)}` });
      continue;
    }

    const entries = splitPolicyFileV1(json);
    entries.forEach((raw, i) => {
      out.push({ origin: entries.length === 1 ? name : `${name}#${i}`, raw });
    });
  }
  return out;
}
