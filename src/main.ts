import { resolve } from "node:path";
import { LocalHost, type Host } from "./lib/host.js";
import { SshHost, sshTestConnection } from "./lib/ssh.js";
import { log } from "./lib/logger.js";
import { loadHardenConfig, loadStackConfig, loadTargetConfig } from "./lib/config.js";
import { parseArgs } from "./lib/cli.js";
import { ConfigError, PreconditionError } from "./lib/errors.js";

async function connect(): Promise<Host> {
  const target = loadTargetConfig();
  if (!target.host) {
    return new LocalHost();
  }

  const options = { host: target.host, user: target.user, port: target.port };
  log.info(`Connecting to ${target.user}@${target.host}`);
  if (!(await sshTestConnection(options))) {
    throw new PreconditionError(`Cannot SSH into ${target.user}@${target.host}`);
  }
  return new SshHost(options);
}

/**
 * Run one command. Resolves with the exit code; errors propagate to the
 * entry point.
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  switch (args.command) {
    case "provision":
    case "status": {
      const { ensureSetupConfig, provisionStack, stackStatus } = await import(
        "./commands/stack.js"
      );
      const configPath = resolve(args.configPath);

      // status never writes, so it cannot generate credentials either
      if (args.command === "provision") {
        await ensureSetupConfig(configPath);
      } else if (!(await new LocalHost().fileExists(configPath))) {
        throw new ConfigError(
          `Configuration file ${configPath} not found. Run 'odoo-provision provision' first.`
        );
      }

      const host = await connect();
      const config = await loadStackConfig(configPath, await host.home());

      if (args.command === "status") {
        await stackStatus(host, config);
      } else {
        await provisionStack(host, config);
      }
      return 0;
    }

    case "harden": {
      const { hardenServer } = await import("./commands/harden.js");
      const [username, publicKey] = args.positional;
      const config = await loadHardenConfig({ username, publicKey });
      await hardenServer(await connect(), config);
      return 0;
    }
  }
}
