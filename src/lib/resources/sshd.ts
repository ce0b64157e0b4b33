import { runOrThrow, type Host } from "../host.js";
import type { ResourceDriver } from "../reconciler.js";

export interface DirectiveSpec {
  file: string;
  value: string;
}

const SSHD_CONFIG_MODE = 0o644;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Parse `sshd -T` output (lower-cased `keyword value` lines) into a map.
 * Only the first value of repeated keywords is kept, as sshd does.
 */
export function parseEffectiveConfig(output: string): Map<string, string> {
  const config = new Map<string, string>();
  for (const line of output.split("\n")) {
    const match = line.trim().match(/^(\S+)\s+(.*)$/);
    if (!match?.[1] || match[2] === undefined) continue;
    const key = match[1].toLowerCase();
    if (!config.has(key)) config.set(key, match[2].trim());
  }
  return config;
}

/**
 * Set `key value` in an sshd_config text.
 *
 * sshd takes the first value it reads, so the first line naming the key,
 * commented or not, becomes the directive and later active lines are
 * commented out. Only the global section before the first `Match` block is
 * touched. When that first line sits after an `Include` (or there is none),
 * the directive goes right before the first `Include`, so drop-in files
 * cannot override it; without an `Include` it goes before `Match` (or at
 * the end).
 */
export function setDirective(content: string, key: string, value: string): string {
  const lines = content.split("\n");
  const pattern = new RegExp(`^\\s*(#\\s*)?${escapeRegExp(key)}(\\s|$)`, "i");
  let matchIndex = lines.findIndex((line) => /^\s*Match\s/i.test(line));
  if (matchIndex === -1) matchIndex = lines.length;

  const global = lines.slice(0, matchIndex);
  const includeIndex = global.findIndex((line) => /^\s*Include\s/i.test(line));
  const firstIndex = global.findIndex((line) => pattern.test(line));
  const replaceFirst = firstIndex !== -1 && (includeIndex === -1 || firstIndex < includeIndex);

  for (let i = replaceFirst ? firstIndex + 1 : 0; i < matchIndex; i++) {
    const line = lines[i] ?? "";
    const found = line.match(pattern);
    if (found && !found[1]) lines[i] = `#${line}`;
  }

  if (replaceFirst) {
    lines[firstIndex] = `${key} ${value}`;
  } else if (includeIndex !== -1) {
    lines.splice(includeIndex, 0, `${key} ${value}`);
  } else {
    // Keep the trailing newline at the end of the file
    const insertAt =
      matchIndex === lines.length && lines[lines.length - 1] === ""
        ? lines.length - 1
        : matchIndex;
    lines.splice(insertAt, 0, `${key} ${value}`);
  }

  return lines.join("\n");
}

function parseSeconds(output: string, source: string): number {
  const seconds = Number(output.trim());
  if (!output.trim() || !Number.isInteger(seconds)) {
    throw new Error(`unexpected output from \`${source}\`: ${output.trim() || "(empty)"}`);
  }
  return seconds;
}

/**
 * Whether the running daemon predates the last change to its config file
 * (or is not running at all). The directive probe reads the file, not the
 * daemon, so an edit whose restart failed is only caught here.
 */
export async function sshdRestartPending(
  host: Host,
  file: string,
  service: string
): Promise<boolean> {
  const pid = (
    await runOrThrow(host, "systemctl", ["show", "--property=MainPID", "--value", service])
  ).trim();
  if (!pid || pid === "0") return true;

  const elapsed = parseSeconds(await runOrThrow(host, "ps", ["-o", "etimes=", "-p", pid]), "ps");
  const now = parseSeconds(await runOrThrow(host, "date", ["+%s"]), "date");
  const modified = parseSeconds(await runOrThrow(host, "stat", ["-c", "%Y", file]), "stat");
  return modified > now - elapsed;
}

/**
 * One sshd_config directive, named by its keyword. The probe asks sshd for
 * its effective configuration, so a value overridden from an included file
 * still shows up as unsatisfied.
 */
export function sshdDirectiveDriver(host: Host): ResourceDriver<DirectiveSpec> {
  return {
    kind: "config-directive",
    artifact: false,

    async probe(resource) {
      const effective = parseEffectiveConfig(
        await runOrThrow(host, "sshd", ["-T", "-f", resource.desiredSpec.file])
      );
      const current = effective.get(resource.name.toLowerCase());
      return current?.toLowerCase() === resource.desiredSpec.value.toLowerCase()
        ? "present-running"
        : "absent";
    },

    async create(resource) {
      const { file, value } = resource.desiredSpec;
      const content = await host.readFile(file);
      await host.writeFile(file, setDirective(content, resource.name, value), {
        mode: SSHD_CONFIG_MODE,
      });
    },
  };
}
