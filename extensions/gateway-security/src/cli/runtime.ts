import { ErrorCode } from "../errors/codes.js";
import {
  GatewaySecurityError,
  describeError,
  formatGatewaySecurityError,
  redactSensitiveInfo,
} from "../errors.js";

export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  exit: (code) => {
    process.exitCode = code;
  },
};

/** Exit code for input the command could not interpret. */
export const EXIT_MALFORMED = 2;

export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    const code = formatGatewaySecurityError(err);
    runtime.error(`${code}: ${redactSensitiveInfo(describeError(err))}`);
    const malformed = err instanceof GatewaySecurityError && code === ErrorCode.E_INVALID_ARGUMENT;
    runtime.exit(malformed ? EXIT_MALFORMED : 1);
  }
}
