#!/usr/bin/env node
/**
 * filewise entry point
 */

import { Command, program } from "commander";
import { join, dirname } from "node:path";
import { existsSync, readFileSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import open from "open";
import { z } from "zod";

import { chat } from "./agent/chat.js";
import { suggestStructure } from "./agent/suggest.js";
import { DESTRUCTIVE_ACTIONS } from "./agent/types.js";
import { authorizeDrive, getDriveAuthStatus, logoutDrive } from "./auth/google.js";
import {
  formatApplyResult,
  formatFileList,
  formatPlan,
  formatPlanList,
  formatSuggestion,
  resolveActionRefs,
} from "./cli/format.js";
import { loadConfig } from "./config/loader.js";
import { defaultConfigDocument, mergeConfigFile } from "./config/merge.js";
import { createDefaultDoctorIO, runDoctorCli } from "./doctor/cli.js";
import { diagnoseDoctor } from "./doctor/index.js";
import { makeFolder, moveFile, removeFile } from "./executor/direct.js";
import { applyPlan } from "./executor/executor.js";
import { startGatewayHttp } from "./gateway/http/server.js";
import { PlanNotFoundError } from "./plan/errors.js";
import { createPlan } from "./plan/planner.js";
import { createPlanStore, type PlanStore } from "./plan/store.js";
import type { Plan } from "./plan/types.js";
import { indexSource } from "./retrieval/indexer.js";
import { chatDeps, createServices, executorDeps, plannerDeps, type Services } from "./runtime.js";
import { createLLMClient } from "./llm/client.js";
import { logger } from "./utils/logger.js";
import { defaultConfigPath, ensureFilewiseHomeEnv, resolvePathLike } from "./utils/paths.js";

const log = logger;

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = z
  .object({ name: z.string(), version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")));

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  log.error(`Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`);
  process.exit(1);
}

const sourceTypeSchema = z.enum(["local", "drive"]);

interface ConfigOptions {
  config: string;
}

interface CommonOptions extends ConfigOptions {
  source?: string;
}

program
  .name("filewise")
  .description("Organize a local folder or Google Drive with a locally-run language model")
  .version(pkg.version);

function withConfig(cmd: Command): Command {
  return cmd.option(
    "-c, --config <path>",
    "Config file path (default: $FILEWISE_HOME/app.yaml)",
    process.env.FILEWISE_CONFIG_PATH ?? defaultConfigPath(),
  );
}

function withSource(cmd: Command): Command {
  return withConfig(cmd).option("-s, --source <type>", "File source for this command: local|drive");
}

/** Log the failure and exit non-zero. */
async function run(what: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    log.error(`${what} failed`, err);
    process.exit(1);
  }
}

async function withServices(options: CommonOptions, fn: (services: Services) => Promise<void>): Promise<void> {
  const config = await loadConfig(options.config);
  const sourceType = options.source === undefined ? undefined : sourceTypeSchema.parse(options.source);
  const services = await createServices(config, sourceType);
  try {
    await fn(services);
  } finally {
    services.close();
  }
}

/** Plan review needs only the plan store, not a connected source. */
async function withPlans<T>(options: ConfigOptions, fn: (plans: PlanStore) => Promise<T>): Promise<T> {
  const config = await loadConfig(options.config);
  const plans = createPlanStore(config.organize.planStorePath);
  try {
    return await fn(plans);
  } finally {
    plans.close();
  }
}

function requirePlan(plans: PlanStore, planId: string): Plan {
  const plan = plans.getPlan(planId);
  if (!plan) throw new PlanNotFoundError(planId);
  return plan;
}

// =============================================================================
// Setup
// =============================================================================

withConfig(program.command("init"))
  .description("Write a starter config and create the local root folder")
  .action(async (options: ConfigOptions) =>
    run("Init", async () => {
      ensureFilewiseHomeEnv();
      const configPath = resolvePathLike(options.config);
      if (existsSync(configPath)) {
        log.info(`Config already exists: ${configPath}`);
      } else {
        await mergeConfigFile(configPath, defaultConfigDocument());
        log.info(`Wrote ${configPath}`);
      }
      const config = await loadConfig(configPath);
      await mkdir(config.local.root, { recursive: true });
      log.info(`Local root: ${config.local.root}`);
      log.info("Next: `ollama pull " + config.llm.model + "`, then `filewise doctor`.");
    }),
  );

withConfig(program.command("doctor"))
  .description("Check config, the model service and the file source")
  .option("--json", "Print the report as JSON")
  .action(async (options: ConfigOptions & { json?: boolean }) =>
    run("Doctor", async () => {
      ensureFilewiseHomeEnv();
      if (options.json) {
        const report = await diagnoseDoctor({ configPath: options.config });
        console.log(JSON.stringify(report, null, 2));
        process.exit(report.ok ? 0 : 1);
      }
      process.exit(await runDoctorCli({ configPath: options.config, io: createDefaultDoctorIO() }));
    }),
  );

withConfig(program.command("model [name]"))
  .description("Show the configured model, list available ones, or set a new one")
  .option("-l, --list", "List models offered by the model service")
  .action(async (name: string | undefined, options: ConfigOptions & { list?: boolean }) =>
    run("Model", async () => {
      const config = await loadConfig(options.config);
      if (options.list) {
        const models = await createLLMClient(config.llm).listModels();
        for (const m of models) console.log(m === config.llm.model ? `${m}  (current)` : m);
        return;
      }
      if (!name) {
        console.log(config.llm.model);
        return;
      }
      await mergeConfigFile(resolvePathLike(options.config), { llm: { model: name } });
      log.info(`Model set to ${name}`);
    }),
  );

// =============================================================================
// Google Drive authentication
// =============================================================================

const auth = program.command("auth").description("Manage Google Drive authentication");

withConfig(auth.command("google"))
  .description("Sign in to Google Drive (opens a browser; paste mode on headless machines)")
  .option("--headless", "Print the URL and read the redirect URL from stdin")
  .action(async (options: ConfigOptions & { headless?: boolean }) =>
    run("Authentication", async () => {
      const config = await loadConfig(options.config);
      await authorizeDrive(config.drive, { headless: options.headless });
    }),
  );

withConfig(auth.command("status"))
  .description("Show whether a Google Drive token is stored")
  .action(async (options: ConfigOptions) =>
    run("Auth status", async () => {
      const config = await loadConfig(options.config);
      const status = await getDriveAuthStatus(config.drive);
      if (!status.authenticated) {
        log.info("Google Drive: Not authenticated");
        log.info("Run 'filewise auth google' to authenticate.");
        return;
      }
      log.info(`Google Drive: Authenticated${status.hasRefreshToken ? "" : " (no refresh token)"}`);
      if (status.expiresAt) log.info(`  Access token expires: ${new Date(status.expiresAt).toISOString()}`);
      if (status.scopes) log.info(`  Scopes: ${status.scopes.join(", ")}`);
    }),
  );

withConfig(auth.command("logout"))
  .description("Delete the stored Google Drive token")
  .action(async (options: ConfigOptions) =>
    run("Logout", async () => {
      const config = await loadConfig(options.config);
      const removed = await logoutDrive(config.drive);
      log.info(removed ? "Logged out from Google Drive" : "No stored Google Drive token");
    }),
  );

// =============================================================================
// File commands
// =============================================================================

withSource(program.command("ls [path]"))
  .description("List a folder")
  .option("-r, --recursive", "Include subfolders")
  .action(async (path: string | undefined, options: CommonOptions & { recursive?: boolean }) =>
    run("ls", () =>
      withServices(options, async (services) => {
        const files = await services.source.list({ folderPath: path ?? "", recursive: options.recursive });
        console.log(formatFileList(files));
      }),
    ),
  );

withSource(program.command("cat <path>"))
  .description("Print a file's text content")
  .action(async (path: string, options: CommonOptions) =>
    run("cat", () =>
      withServices(options, async ({ source }) => {
        const file = await source.stat(path);
        if (!file || file.isFolder) throw new Error(`Not a file: ${path}`);
        const content = await source.readContent(file);
        if (content.text === undefined) throw new Error(`No text content (${content.mimeType})`);
        process.stdout.write(content.text.endsWith("\n") ? content.text : `${content.text}\n`);
      }),
    ),
  );

withSource(program.command("mkdir <path>"))
  .description("Create a folder (and its parents)")
  .action(async (path: string, options: CommonOptions) =>
    run("mkdir", () =>
      withServices(options, async (services) => {
        const folder = await makeFolder(services, path);
        log.info(`Folder ready: ${folder.path}`);
      }),
    ),
  );

withSource(program.command("mv <path> <folder>"))
  .description("Move a file or folder into a folder")
  .action(async (path: string, folder: string, options: CommonOptions) =>
    run("mv", () =>
      withServices(options, async (services) => {
        const moved = await moveFile(services, path, folder);
        log.info(`Moved to ${moved.path}`);
      }),
    ),
  );

withSource(program.command("rm <path>"))
  .description("Move a file to the trash, or delete it with --permanent")
  .option("--permanent", "Delete instead of trashing")
  .action(async (path: string, options: CommonOptions & { permanent?: boolean }) =>
    run("rm", () =>
      withServices(options, async (services) => {
        await removeFile(services, path, options.permanent ? "permanent" : "trash");
        log.info(`${options.permanent ? "Deleted" : "Trashed"} ${path}`);
      }),
    ),
  );

// =============================================================================
// Index and retrieval
// =============================================================================

withSource(program.command("index [folder]"))
  .description("Index file contents for suggest and chat")
  .action(async (folder: string | undefined, options: CommonOptions) =>
    run("Indexing", () =>
      withServices(options, async (services) => {
        const stats = await indexSource({
          db: services.index,
          source: services.source,
          config: services.config.index,
          llm: services.llm,
          folderPath: folder,
        });
        log.info(
          `Indexed ${stats.indexed}, unchanged ${stats.skipped}, removed ${stats.removed}, failed ${stats.failed}`,
        );
      }),
    ),
  );

withSource(program.command("suggest [folder]"))
  .description("Index, then ask the model for a reorganized folder structure")
  .action(async (folder: string | undefined, options: CommonOptions) =>
    run("Suggest", () =>
      withServices(options, async (services) => {
        await indexSource({
          db: services.index,
          source: services.source,
          config: services.config.index,
          llm: services.llm,
          folderPath: folder,
        });
        const files = await services.source.list({ folderPath: folder, recursive: true });
        const structure = await suggestStructure({ db: services.index, llm: services.llm, files });
        console.log(formatSuggestion(structure));
      }),
    ),
  );

withSource(program.command("chat [question...]"))
  .description("Ask questions about indexed files (interactive without a question)")
  .option("--session <id>", "Conversation id", "cli")
  .action(async (words: string[], options: CommonOptions & { session: string }) =>
    run("Chat", () =>
      withServices(options, async (services) => {
        const deps = chatDeps(services);
        if (words.length > 0) {
          const { answer, sources } = await chat(deps, options.session, words.join(" "));
          console.log(answer);
          if (sources.length > 0) console.log(`\nSources: ${sources.join(", ")}`);
          return;
        }

        const rl = createInterface({ input: process.stdin, output: process.stdout });
        rl.setPrompt("> ");
        rl.prompt();
        try {
          for await (const line of rl) {
            const question = line.trim();
            if (question === "exit" || question === "quit") break;
            if (question) {
              const { answer, sources } = await chat(deps, options.session, question);
              console.log(answer);
              if (sources.length > 0) console.log(`Sources: ${sources.join(", ")}\n`);
            }
            rl.prompt();
          }
        } finally {
          rl.close();
        }
      }),
    ),
  );

// =============================================================================
// Plans
// =============================================================================

withSource(program.command("plan [folder]"))
  .description("Classify every file and store a plan for review")
  .action(async (folder: string | undefined, options: CommonOptions) =>
    run("Planning", () =>
      withServices(options, async (services) => {
        const plan = await createPlan(
          {
            ...plannerDeps(services),
            onProgress: (done, total, file) => log.info(`[${done}/${total}] ${file.path}`),
          },
          { folderPath: folder },
        );
        console.log(formatPlan(plan));
        console.log(`\nReview with \`filewise approve ${plan.id} <n...>\`, then \`filewise apply ${plan.id}\`.`);
      }),
    ),
  );

withConfig(program.command("plans"))
  .description("List stored plans")
  .option("-n, --limit <n>", "How many", "20")
  .action(async (options: ConfigOptions & { limit: string }) =>
    run("Listing plans", () =>
      withPlans(options, async (plans) => {
        console.log(formatPlanList(plans.listPlans(Number.parseInt(options.limit, 10) || 20)));
      }),
    ),
  );

withConfig(program.command("show <planId>"))
  .description("Show a plan's actions")
  .action(async (planId: string, options: ConfigOptions) =>
    run("Show", () =>
      withPlans(options, async (plans) => {
        console.log(formatPlan(requirePlan(plans, planId)));
      }),
    ),
  );

withConfig(program.command("approve <planId> [actions...]"))
  .description("Approve actions by number or id")
  .option("--all", "Approve every pending non-destructive action")
  .action(async (planId: string, refs: string[], options: ConfigOptions & { all?: boolean }) =>
    run("Approve", () =>
      withPlans(options, async (plans) => {
        if (options.all) {
          const n = plans.approveAll(planId, (a) => !DESTRUCTIVE_ACTIONS.has(a.decision.action));
          log.info(`Approved ${n} action(s); deletions and duplicates need explicit approval`);
        } else if (refs.length === 0) {
          throw new Error("Name the actions to approve, or pass --all");
        }
        for (const id of resolveActionRefs(requirePlan(plans, planId), refs)) {
          const action = plans.setActionStatus(planId, id, "approved");
          log.info(`Approved ${action.file.path}`);
        }
      }),
    ),
  );

withConfig(program.command("reject <planId> <actions...>"))
  .description("Reject actions by number or id")
  .action(async (planId: string, refs: string[], options: ConfigOptions) =>
    run("Reject", () =>
      withPlans(options, async (plans) => {
        for (const id of resolveActionRefs(requirePlan(plans, planId), refs)) {
          const action = plans.setActionStatus(planId, id, "rejected");
          log.info(`Rejected ${action.file.path}`);
        }
      }),
    ),
  );

withConfig(program.command("apply <planId>"))
  .description("Apply a plan's approved actions")
  .option("--dry-run", "Show what would happen without changing anything")
  .action(async (planId: string, options: ConfigOptions & { dryRun?: boolean }) =>
    run("Apply", async () => {
      const { source } = await withPlans(options, async (plans) => requirePlan(plans, planId));
      // Apply against the source the plan was made for.
      await withServices({ ...options, source }, async (services) => {
        const result = await applyPlan(executorDeps(services), planId, { dryRun: options.dryRun });
        console.log(formatApplyResult(result));
        if (result.outcomes.some((o) => o.status === "failed")) process.exitCode = 1;
      });
    }),
  );

// =============================================================================
// Web front end
// =============================================================================

withSource(program.command("serve"))
  .description("Start the web front end")
  .option("--open", "Open the page in a browser")
  .action(async (options: CommonOptions & { open?: boolean }) =>
    run("Gateway", async () => {
      const config = await loadConfig(options.config);
      const sourceType = options.source === undefined ? undefined : sourceTypeSchema.parse(options.source);
      const services = await createServices(config, sourceType);
      const gateway = await startGatewayHttp({ config: config.gateway, services, version: pkg.version });
      log.info(`filewise ${pkg.version} serving ${services.source.kind} ${services.source.root} at ${gateway.baseUrl}`);
      if (!config.gateway.token && config.gateway.host !== "127.0.0.1" && config.gateway.host !== "localhost") {
        log.warn("Gateway is reachable from the network without a token; set gateway.token");
      }
      if (options.open) {
        open(gateway.baseUrl).catch((err: unknown) => {
          log.warn("Failed to open browser", err);
        });
      }

      const shutdown = (signal: string) => {
        log.info(`Received ${signal}, shutting down...`);
        gateway
          .stop()
          .then(() => {
            services.close();
            process.exit(0);
          })
          .catch((err: unknown) => {
            log.error("Shutdown failed", err);
            process.exit(1);
          });
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    }),
  );

await program.parseAsync();
