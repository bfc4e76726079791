import "dotenv/config";
import { Command, Option } from "commander";
import { aiProviderEnum } from "@shared/schema";
import { startServer } from "./index";
import { configFromOptions, CliOptionsZ } from "./src/cli/options";
import { formatBatchSummary, formatFolderList, formatResult } from "./src/cli/format";
import { assertProviderReady, type AppConfig } from "./src/config";
import { errorMessage, PipelineError } from "./src/errors";
import { createLogger, logLevels, setLogLevel } from "./src/logger";
import { ProcessingService } from "./src/orchestrator/processingService";

const logger = createLogger("CLI");

const BANNER = `
+--------------------------------------------------------------+
|          Prior Authorization Form Filler                     |
|     Referral package extraction and PA form auto-fill        |
+--------------------------------------------------------------+`;

function resolveConfig(command: Command): AppConfig {
  const options = CliOptionsZ.parse(command.optsWithGlobals());
  const config = configFromOptions(options, process.env);
  setLogLevel(config.logLevel);
  return config;
}

function fail(error: unknown): void {
  const prefix = error instanceof PipelineError ? `${error.name}: ` : "";
  console.error(`Error: ${prefix}${errorMessage(error)}`);
  process.exitCode = 1;
}

const program = new Command();

program
  .name("pa-form-filler")
  .description("Fill Prior Authorization forms from referral packages with an LLM")
  .version("1.0.0")
  .addOption(new Option("--provider <provider>", "AI provider").choices(aiProviderEnum))
  .option("--openai-key <key>", "OpenAI API key (overrides OPENAI_API_KEY)")
  .option("--anthropic-key <key>", "Anthropic API key (overrides ANTHROPIC_API_KEY)")
  .option("--vision", "send rendered scanned pages to the model")
  .option("--no-vision", "text extraction only")
  .option("--threshold <value>", "confidence threshold between filled and uncertain (0-1)")
  .option("--input-dir <dir>", "directory holding one folder per patient")
  .option("--output-dir <dir>", "directory for filled forms and reports")
  .addOption(new Option("--log-level <level>", "log verbosity").choices(logLevels));

program
  .command("list")
  .description("list patient folders and whether they can be processed")
  .action(async (_opts: unknown, command: Command) => {
    const config = resolveConfig(command);
    const service = new ProcessingService(config);
    console.log(formatFolderList(await service.listFolders()));
  });

program
  .command("process")
  .description("process one patient folder")
  .argument("<folder>", "folder name under the input directory")
  .action(async (folder: string, _opts: unknown, command: Command) => {
    const config = resolveConfig(command);
    assertProviderReady(config);
    console.log(BANNER);

    const result = await new ProcessingService(config).processFolder(folder);
    console.log(formatResult(result));
    if (result.status !== "done") process.exitCode = 1;
  });

program
  .command("process-all")
  .description("process every patient folder")
  .option("--parallel", "process folders concurrently")
  .option("--workers <n>", "worker pool size in parallel mode")
  .action(async (_opts: unknown, command: Command) => {
    const config = resolveConfig(command);
    assertProviderReady(config);
    console.log(BANNER);

    const options = CliOptionsZ.parse(command.optsWithGlobals());
    const batch = await new ProcessingService(config).processAll({
      parallel: options.parallel ?? false,
      onResult: result => console.log(formatResult(result)),
    });
    console.log(formatBatchSummary(batch));
    if (batch.summary.failed > 0) process.exitCode = 1;
  });

program
  .command("serve")
  .description("start the REST API server")
  .option("--host <host>", "bind address")
  .option("--port <port>", "listen port")
  .action(async (_opts: unknown, command: Command) => {
    const config = resolveConfig(command);
    assertProviderReady(config);
    await startServer(config);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.debug("Command failed", error);
  fail(error);
});
