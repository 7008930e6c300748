import { homedir } from "node:os";
import type { ResolvedSettings } from "../core/config.ts";
import { type DoctorCheck, runDoctorChecks } from "../core/doctor.ts";
import { resolveExtractSettings } from "./extract.ts";

export interface DoctorOptions {
  corpus?: string | undefined;
  input?: string | undefined;
  stopWords?: number | undefined;
  minLength?: number | undefined;
}

export function formatCheck(check: DoctorCheck): string {
  const icon = check.ok ? "OK" : "WARN";
  return `${icon.padEnd(4)} ${check.name.padEnd(20)} ${check.detail}`;
}

function settingsOrCheck(options: DoctorOptions): ResolvedSettings | DoctorCheck {
  try {
    return resolveExtractSettings({
      corpus: options.corpus,
      stopWords: options.stopWords,
      minLength: options.minLength,
    });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { name: "config", ok: false, detail };
  }
}

export async function runDoctor(options: DoctorOptions = {}): Promise<void> {
  const resolved = settingsOrCheck(options);

  // Without settings there is no corpus path to check.
  const checks =
    "ok" in resolved
      ? [resolved]
      : runDoctorChecks({
          corpusPath: resolved.corpusPath,
          stopWordCount: resolved.stopWordCount,
          minWordLength: resolved.minWordLength,
          inputPath: options.input,
          configLocations: { cwd: process.cwd(), home: homedir() },
        });

  let failures = 0;
  for (const check of checks) {
    if (!check.ok) {
      failures += 1;
    }
    console.log(formatCheck(check));
  }

  if (failures > 0) {
    console.log(`\nDoctor completed with ${failures} warning(s).`);
    return;
  }

  console.log("\nDoctor completed successfully.");
}
