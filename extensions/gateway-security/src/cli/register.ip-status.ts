import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import {
  IpStatus,
  describeIpStatus,
  isValidIp,
  parseIpStatusPayloads,
} from "../admission/ip-status.js";
import type { AdmissionStore } from "../admission/store.js";
import { resolveConfigFromEnv, type GatewaySecurityConfig } from "../config.js";
import { PayloadValidationError } from "../errors.js";
import { runCommandWithRuntime, type RuntimeEnv } from "./runtime.js";

export type StoreOpener = (config: GatewaySecurityConfig) => {
  store: AdmissionStore;
  close: () => Promise<void>;
};

type StoreOptions = { redisUrl?: string; table?: string };

const STATUS_BY_LABEL: ReadonlyMap<string, IpStatus> = new Map([
  ["trusted", IpStatus.Trusted],
  ["blocked", IpStatus.Blocked],
  ["none", IpStatus.None],
]);

function resolveStoreConfig(opts: StoreOptions, env: NodeJS.ProcessEnv): GatewaySecurityConfig {
  const config = resolveConfigFromEnv(env);
  if (opts.redisUrl) {
    config.store.mode = "redis";
    config.store.url = opts.redisUrl;
  }
  if (opts.table) {
    config.store.tableName = opts.table;
  }
  return config;
}

function parseIp(ip: string): string {
  if (!isValidIp(ip)) {
    throw new PayloadValidationError(`invalid ip address: ${ip}`);
  }
  return ip;
}

export function registerIpStatusCommands(
  program: Command,
  runtime: RuntimeEnv,
  openStore: StoreOpener,
  env: NodeJS.ProcessEnv = process.env,
) {
  const ipStatus = program
    .command("ip-status")
    .description("Inspect and update the gateway IP admission list")
    .option("--redis-url <url>", "Redis URL (default: GATEWAY_GUARD_REDIS_URL)")
    .option("--table <name>", "Hash key holding the list (default: status_list)")
    .showHelpAfterError();

  async function withStore(run: (store: AdmissionStore) => Promise<void>): Promise<void> {
    const { store, close } = openStore(resolveStoreConfig(ipStatus.opts<StoreOptions>(), env));
    try {
      await run(store);
    } finally {
      await close();
    }
  }

  ipStatus
    .command("list")
    .description("Print every stored ip and its raw status code")
    .action(async () => {
      await runCommandWithRuntime(runtime, () =>
        withStore(async (store) => {
          const entries = await store.readAll();
          for (const [ip, code] of entries) {
            runtime.log(`${ip}\t${code}`);
          }
        }),
      );
    });

  ipStatus
    .command("get")
    .description("Print the admission status of one ip")
    .argument("<ip>", "IPv4 or IPv6 address")
    .action(async (ip: string) => {
      await runCommandWithRuntime(runtime, () =>
        withStore(async (store) => {
          const status = await store.read(parseIp(ip));
          runtime.log(describeIpStatus(status));
        }),
      );
    });

  ipStatus
    .command("set")
    .description("Record a single admission decision")
    .argument("<ip>", "IPv4 or IPv6 address")
    .argument("<status>", "trusted | blocked | none")
    .action(async (ip: string, label: string) => {
      await runCommandWithRuntime(runtime, () =>
        withStore(async (store) => {
          const status = STATUS_BY_LABEL.get(label.toLowerCase());
          if (status === undefined) {
            throw new PayloadValidationError(`status must be trusted, blocked or none: ${label}`);
          }
          await store.insert(parseIp(ip), status);
          runtime.log(`${ip} ${describeIpStatus(status)}`);
        }),
      );
    });

  ipStatus
    .command("import")
    .description("Bulk upsert a JSON file of [{ ip, status }] records")
    .argument("<file>", "Path to the JSON file")
    .action(async (file: string) => {
      await runCommandWithRuntime(runtime, () =>
        withStore(async (store) => {
          let parsed: unknown;
          try {
            parsed = JSON.parse(await readFile(file, "utf8"));
          } catch (err) {
            throw new PayloadValidationError(
              `invalid import file: ${err instanceof Error ? err.message : String(err)}`,
            );
          }
          const records = parseIpStatusPayloads(parsed);
          await store.bulkInsert(records);
          runtime.log(`imported ${records.length} entries`);
        }),
      );
    });
}
