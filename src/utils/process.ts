import { execa } from "execa";

export async function runCommand(command: string, args: string[], options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string>; }): Promise<{ stdout: string; stderr: string; exitCode: number; }> {
  try {
    const { stdout, stderr, exitCode } = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
    });
    return { stdout, stderr, exitCode };
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`Command failed (${command} ${args.join(" ")}): ${detail}`, { cause: err });
  }
}
