import { Command } from "commander";
import { closeAdmissionStore, createAdmissionStore } from "../admission/create-store.js";
import { consoleLogger } from "../logger.js";
import { registerClaimCommands } from "./register.claim.js";
import { registerIpStatusCommands, type StoreOpener } from "./register.ip-status.js";
import { defaultRuntime, type RuntimeEnv } from "./runtime.js";

export const defaultStoreOpener: StoreOpener = (config) => {
  const store = createAdmissionStore(config, consoleLogger);
  return { store, close: () => closeAdmissionStore(store) };
};

export type BuildProgramOptions = {
  runtime?: RuntimeEnv;
  openStore?: StoreOpener;
  env?: NodeJS.ProcessEnv;
};

export function buildProgram(options: BuildProgramOptions = {}): Command {
  const runtime = options.runtime ?? defaultRuntime;
  const program = new Command()
    .name("gateway-guard")
    .description("Operator tooling for gateway signed claims and IP admission");

  registerClaimCommands(program, runtime);
  registerIpStatusCommands(
    program,
    runtime,
    options.openStore ?? defaultStoreOpener,
    options.env ?? process.env,
  );
  return program;
}
