#!/usr/bin/env node

import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { configFromEnv, EsnlConfigInput } from "../lib/config";
import { EnaAssemblyDataSource } from "../lib/ena-assembly-data-source";
import { assemblyToJson } from "../lib/entity-types";
import { parseAssemblyJson } from "../lib/assembly-json";
import { ErrorReport } from "../lib/common-types";
import { EsnlError } from "../lib/esnl-errors";

type CommonOptions = {
  archive?: string;
  downloadDir?: string;
  maxAttempts?: number;
  appendUnmatched?: boolean;
};

function buildDataSource(options: CommonOptions): EnaAssemblyDataSource {
  const overrides: EsnlConfigInput = {
    archiveLocation: options.archive,
    // relative download folders are taken from where we were run
    downloadDir: options.downloadDir ? resolve(options.downloadDir) : undefined,
    appendUnmatchedSequences: options.appendUnmatched,
    retry: { maxAttempts: options.maxAttempts },
  };

  return new EnaAssemblyDataSource(configFromEnv(process.env, overrides));
}

function printError(report: ErrorReport) {
  console.error(JSON.stringify(report, null, 2));
  process.exitCode = 1;
}

function withCommonOptions(command: Command): Command {
  return command
    .option(
      "--archive <location>",
      "archive root (ftp://..., s3://... or an absolute path)",
    )
    .option("--download-dir <path>", "folder for temporary report downloads")
    .option("--max-attempts <n>", "download attempts before giving up", (v) =>
      parseInt(v, 10),
    );
}

const program = new Command();

program
  .name("esnl")
  .description("Look up ENA sequence names for genome assemblies");

withCommonOptions(program.command("fetch"))
  .description("fetch and print the ENA sequence report for an assembly")
  .argument("<accession>", "assembly accession e.g. GCA_000002305.1")
  .action(async (accession: string, options: CommonOptions) => {
    const dataSource = buildDataSource(options);

    const result = await dataSource.getAssemblyByAccession(accession);

    if (result.state !== "found")
      printError({
        state: "error",
        error: "Assembly not available from ENA",
        specific: [{ message: result.reason, accession: accession }],
      });
    else console.log(JSON.stringify(assemblyToJson(result.value), null, 2));
  });

withCommonOptions(program.command("enrich"))
  .description("add ENA sequence names to an assembly held in a JSON file")
  .argument("<assembly-json>", "path to the assembly JSON")
  .option("--append-unmatched", "also add ENA sequences the assembly lacks")
  .action(async (assemblyJson: string, options: CommonOptions) => {
    const dataSource = buildDataSource(options);

    const assembly = parseAssemblyJson(
      await readFile(resolve(assemblyJson), { encoding: "utf-8" }),
    );

    const outcome = await dataSource.addEnaSequenceNamesToAssembly(assembly);

    if (outcome.state === "unavailable")
      printError({
        state: "error",
        error: "Assembly not available from ENA",
        specific: [
          { message: outcome.reason, accession: assembly.insdcAccession },
        ],
      });
    else console.log(JSON.stringify(assemblyToJson(assembly), null, 2));
  });

program.parseAsync().catch((e: unknown) => {
  if (e instanceof EsnlError)
    printError({ state: "error", error: e.message, specific: e.specifics });
  else {
    console.error(e);
    process.exitCode = 1;
  }
});
