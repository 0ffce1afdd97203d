import type { Command } from "commander";
import { redactSensitiveInfo } from "../errors.js";
import { dateMessageIn } from "../identity/date-message.js";
import { addressForSecretKey, authenticateClaim, signClaim } from "../identity/signed-message.js";
import { claimToWire, type SignedMessageClaim } from "../identity/types.js";
import { EXIT_MALFORMED, runCommandWithRuntime, type RuntimeEnv } from "./runtime.js";

const MINUTE_MS = 60_000;

export function registerClaimCommands(program: Command, runtime: RuntimeEnv) {
  const claim = program
    .command("claim")
    .description("Sign and verify time-bounded signed claims")
    .showHelpAfterError();

  claim
    .command("sign")
    .description("Sign an expiry timestamp and print the claim as JSON")
    .requiredOption("--key <hex>", "Secret key (32 bytes hex)")
    .option("--ttl <minutes>", "Minutes until the claim expires", "5")
    .option("--date <dateMessage>", "Explicit expiry, YYYY-MM-DD HH:MM:SS ±ZZZZ")
    .action(async (opts: { key: string; ttl: string; date?: string }) => {
      await runCommandWithRuntime(runtime, async () => {
        const ttlMinutes = Number.isFinite(Number(opts.ttl)) ? Number(opts.ttl) : 5;
        const signed: SignedMessageClaim = {
          address: addressForSecretKey(opts.key),
          dateMessage: opts.date ?? dateMessageIn(ttlMinutes * MINUTE_MS),
          signature: "",
        };
        await signClaim(signed, opts.key);
        runtime.log(JSON.stringify(claimToWire(signed), null, 2));
      });
    });

  claim
    .command("verify")
    .description("Verify a signed claim against the current time")
    .requiredOption("--address <address>", "Checksummed signer address")
    .requiredOption("--date <dateMessage>", "Signed expiry timestamp")
    .requiredOption("--signature <hex>", "65-byte signature")
    .action(async (opts: { address: string; date: string; signature: string }) => {
      await runCommandWithRuntime(runtime, async () => {
        const outcome = await authenticateClaim({
          address: opts.address,
          dateMessage: opts.date,
          signature: opts.signature,
        });
        switch (outcome.status) {
          case "authenticated":
            runtime.log(`authenticated ${outcome.address}`);
            return;
          case "rejected":
            runtime.log(`rejected (${outcome.reason})`);
            runtime.exit(1);
            return;
          case "malformed":
            runtime.error(`${outcome.error.code}: ${redactSensitiveInfo(outcome.error.message)}`);
            runtime.exit(EXIT_MALFORMED);
            return;
        }
      });
    });
}
