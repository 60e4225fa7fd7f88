#!/usr/bin/env -S node --import tsx
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { handleCLI } from "@operator/cli";
import { z } from "@operator/utils";

const packageSchema = z.object({ version: z.string() });

const { version } = packageSchema.parse(
  JSON.parse(
    readFileSync(fileURLToPath(new URL("../package.json", import.meta.url)), {
      encoding: "utf8",
    }),
  ),
);

await handleCLI({
  operatorPath: process.argv[1] ?? fileURLToPath(import.meta.url),
  version,
});
