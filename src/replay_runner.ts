import { parseArgs } from "node:util";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { loadPoolConfig } from "./config/config";
import { createSql } from "./config/database";
import { parseScenario, runScenario } from "./scenario";
import {
  PoolEventRecorder,
  PostgresPoolEventRepository,
} from "./services/pool_event_repository";

export function toJSON(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v) => (typeof v === "bigint" ? v.toString() : v),
    2
  );
}

async function main() {
  const {
    values: { scenario: scenarioPath, persist },
  } = parseArgs({
    options: {
      scenario: { type: "string" },
      persist: { type: "boolean", default: false },
    },
  });

  if (!scenarioPath) {
    throw new Error("--scenario path is required");
  }

  const resolved = path.resolve(process.cwd(), scenarioPath);
  const scenario = parseScenario(JSON.parse(await readFile(resolved, "utf8")));
  const config = scenario.pool ?? loadPoolConfig();

  if (!persist) {
    const report = runScenario(scenario, config, { logger: console });
    console.log(toJSON(report));
    return;
  }

  const repository = new PostgresPoolEventRepository(createSql());
  const recorder = new PoolEventRecorder(repository, console);
  try {
    await repository.ensureSchema();
    const report = runScenario(scenario, config, {
      logger: console,
      listeners: [recorder],
    });
    const written = await recorder.flush();
    console.log(toJSON(report));
    console.log(`[replay] persisted ${written} events`);
  } finally {
    await repository.close();
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  main().catch((err) => {
    console.error("Replay failed:", err);
    process.exit(1);
  });
}
