#!/usr/bin/env node
import { runCli } from "./adapters/cli/main";
import { DomainError } from "./domain/errors";

async function bootstrap() {
  await runCli();
}

bootstrap().catch((err: unknown) => {
  if (err instanceof DomainError) {
    console.error(`Error (${err.field}): ${err.message}`);
  } else {
    console.error("Error fatal:", err);
  }
  process.exit(1);
});
