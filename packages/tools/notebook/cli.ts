#!/usr/bin/env -S npx tsx
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Command } from "commander";
import {
  formatComplete,
  formatCreate,
  formatError,
  formatFailure,
  formatList,
  formatPush,
  formatShow,
  recordToJson,
} from "./adapters/cli/formatter.ts";
import { SystemClock } from "./adapters/clock/system-clock.ts";
import { loadConfig, requireDataDir } from "./adapters/config/env-config.ts";
import { SpawnEditor } from "./adapters/editor/spawn-editor.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { OutlineMarkdownService } from "./adapters/markdown/outline-parser.ts";
import { FileRecordRepository } from "./adapters/repositories/file-record-repo.ts";
import { FileTemplateRepository } from "./adapters/repositories/file-template-repo.ts";
import { Blake2HashService } from "./adapters/services/blake2-hash.ts";
import { JsYamlService } from "./adapters/services/js-yaml-service.ts";
import {
  formatMoment,
  isRecordType,
  type ListOutput,
  NbError,
  type NotebookConfig,
  RECORD_TYPES,
  type RecordType,
  type ResolveOutput,
  serializeMoment,
  type ShowOutput,
} from "./types.ts";
import { CompleteRecordUseCase } from "./domain/use-cases/complete-record.ts";
import { CreateRecordUseCase } from "./domain/use-cases/create-record.ts";
import { EditRecordUseCase } from "./domain/use-cases/edit-record.ts";
import { FindRecordUseCase } from "./domain/use-cases/find-record.ts";
import { ListRecordsUseCase } from "./domain/use-cases/list-records.ts";
import { ParseRecordUseCase } from "./domain/use-cases/parse-record.ts";
import { PushDueUseCase } from "./domain/use-cases/push-due.ts";
import { MomentResolver } from "./domain/use-cases/resolve-moment.ts";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

// ============================================================================
// Constants
// ============================================================================

// Listing shortcuts: `nb tasks` is `nb list -t task`
const TYPE_SHORTCUTS: ReadonlyArray<readonly [string, RecordType]> = [
  ["tasks", "task"],
  ["due-dates", "due-date"],
  ["focus", "focus"],
  ["predictions", "prediction"],
  ["notes", "note"],
  ["gists", "gist"],
  ["events", "event"],
  ["metrics", "metric"],
];

type Env = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Wiring
// ============================================================================

function createServices(config: NotebookConfig) {
  const dataDir = requireDataDir(config);
  const fs = new NodeFileSystem();
  const yamlService = new JsYamlService();
  const markdownService = new OutlineMarkdownService();
  const hashService = new Blake2HashService();
  const clock = new SystemClock(config.timeZone);
  const editor = new SpawnEditor(config.editor);
  const recordRepo = new FileRecordRepository(fs, hashService, dataDir);
  const templateRepo = new FileTemplateRepository(fs, config.templateDirs);
  const parser = new ParseRecordUseCase({
    yamlService,
    markdownService,
    hashService,
    clock,
    timeZone: config.timeZone,
  });
  const finder = new FindRecordUseCase(recordRepo, parser);
  const mutation = { finder, recordRepo, yamlService, markdownService, clock };

  return {
    finder,
    listRecords: new ListRecordsUseCase({
      recordRepo,
      parser,
      concurrency: config.concurrency,
    }),
    completeRecord: new CompleteRecordUseCase(mutation),
    pushDue: new PushDueUseCase({ ...mutation, timeZone: config.timeZone }),
    createRecord: new CreateRecordUseCase({
      templateRepo,
      recordRepo,
      parser,
      editor,
      clock,
    }),
    editRecord: new EditRecordUseCase(finder, editor),
  };
}

// ============================================================================
// Helpers
// ============================================================================

function handleError(e: unknown, json: boolean): never {
  if (e instanceof NbError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    process.exit(1);
  }
  throw e;
}

function parseType(value: string): RecordType {
  if (!isRecordType(value)) {
    throw new NbError(
      "invalid_args",
      `Unknown record type: ${value} (expected one of ${RECORD_TYPES.join(", ")})`,
    );
  }
  return value;
}

function parseTypes(
  values: readonly string[] | undefined,
): RecordType[] | undefined {
  if (!values || values.length === 0) return undefined;
  return values.map(parseType);
}

function printList(output: ListOutput, showAll: boolean, json: boolean): void {
  if (json) {
    console.log(JSON.stringify({
      records: output.records.map(recordToJson),
      failures: output.failures,
    }));
    return;
  }
  for (const failure of output.failures) {
    console.error(formatFailure(failure));
  }
  console.log(formatList(output, showAll));
}

function printShow(output: ShowOutput, json: boolean): void {
  console.log(
    json ? JSON.stringify(recordToJson(output.record)) : formatShow(output),
  );
}

// ============================================================================
// Commands
// ============================================================================

type ListOptions = {
  type?: string[];
  all?: boolean;
  tag?: string;
  json?: boolean;
};

async function cmdList(
  env: Env,
  types: readonly RecordType[] | undefined,
  options: ListOptions,
): Promise<void> {
  const json = options.json ?? false;
  try {
    const { listRecords } = createServices(loadConfig(env));
    const showAll = options.all ?? false;
    const output = await listRecords.execute({
      types,
      showAll,
      tag: options.tag,
    });
    printList(output, showAll, json);
  } catch (e) {
    handleError(e, json);
  }
}

function cmdResolve(
  env: Env,
  expression: string,
  from: string | undefined,
): ResolveOutput | null {
  const config = loadConfig(env);
  const resolver = new MomentResolver(config.timeZone);
  const now = new SystemClock(config.timeZone).now();
  const reference = from ? resolver.resolveStored(from, now) ?? now : now;
  const moment = resolver.resolveStored(expression, reference);
  if (!moment) return null;
  return {
    expression,
    kind: moment.kind,
    value: serializeMoment(moment),
    display: formatMoment(moment),
  };
}

// ============================================================================
// CLI with commander
// ============================================================================

function buildProgram(env: Env): Command {
  const program = new Command()
    .name("nb")
    .version(VERSION)
    .description(
      "Notebook - tasks, due dates, predictions and notes as timestamped files\n\n" +
        "Records live in $NOTES_PATH/data (or $NOTES_DATA_DIR) as\n" +
        "<ISO timestamp>-<type>.yaml or .md files.\n\n" +
        "Dates accept: YYYY-MM-DD, HH:MM, 'YYYY-MM-DD HH am', '3 days',\n" +
        "'2 business days', 'friday', 'next friday', today, tomorrow, never.\n\n" +
        "See 'nb <command> --help' for details",
    );

  program
    .command("list")
    .description("List records (active ones unless --all)")
    .option("-t, --type <type...>", `Record types: ${RECORD_TYPES.join(", ")}`)
    .option("-a, --all", "Include completed and irrelevant records")
    .option("--tag <tag>", "Only records carrying this tag")
    .option("--json", "Output as JSON")
    .action(async (options: ListOptions) => {
      let types: RecordType[] | undefined;
      try {
        types = parseTypes(options.type);
      } catch (e) {
        handleError(e, options.json ?? false);
      }
      await cmdList(env, types, options);
    });

  for (const [name, type] of TYPE_SHORTCUTS) {
    program
      .command(name)
      .description(`List ${type} records`)
      .option("-a, --all", "Include completed and irrelevant records")
      .option("--tag <tag>", "Only records carrying this tag")
      .option("--json", "Output as JSON")
      .action(async (options: ListOptions) => {
        await cmdList(env, [type], options);
      });
  }

  program
    .command("show")
    .description("Show one record")
    .argument("<id>", "Record id or unique prefix")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: { json?: boolean }) => {
      const json = options.json ?? false;
      try {
        const { finder } = createServices(loadConfig(env));
        const { record } = await finder.execute(id);
        printShow({ record }, json);
      } catch (e) {
        handleError(e, json);
      }
    });

  program
    .command("new")
    .description("Create a record from its template in $EDITOR")
    .argument("<type>", `Record type: ${RECORD_TYPES.join(", ")}`)
    .option("--md", "Use the Markdown template")
    .option("--json", "Output as JSON")
    .action(async (type: string, options: { md?: boolean; json?: boolean }) => {
      const json = options.json ?? false;
      try {
        const recordType = parseType(type);
        const { createRecord } = createServices(loadConfig(env));
        const output = await createRecord.execute({
          type: recordType,
          format: options.md ? "markdown" : undefined,
        });
        console.log(json ? JSON.stringify(output) : formatCreate(output));
      } catch (e) {
        handleError(e, json);
      }
    });

  program
    .command("edit")
    .description("Open a record in $EDITOR, then check it still parses")
    .argument("<id>", "Record id or unique prefix")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: { json?: boolean }) => {
      const json = options.json ?? false;
      try {
        const { editRecord } = createServices(loadConfig(env));
        printShow(await editRecord.execute({ id }), json);
      } catch (e) {
        handleError(e, json);
      }
    });

  program
    .command("complete")
    .description("Mark a record completed")
    .argument("<id>", "Record id or unique prefix")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: { json?: boolean }) => {
      const json = options.json ?? false;
      try {
        const { completeRecord } = createServices(loadConfig(env));
        const output = await completeRecord.execute({ id });
        console.log(json ? JSON.stringify(output) : formatComplete(output));
      } catch (e) {
        handleError(e, json);
      }
    });

  program
    .command("push")
    .description("Move a record's due date (previous one kept in history)")
    .argument("<id>", "Record id or unique prefix")
    .argument("<when...>", "New due date, e.g. 'tomorrow', '3 days', 2022-06-01")
    .option("--json", "Output as JSON")
    .action(async (id: string, when: string[], options: { json?: boolean }) => {
      const json = options.json ?? false;
      try {
        const { pushDue } = createServices(loadConfig(env));
        const output = await pushDue.execute({ id, to: when.join(" ") });
        console.log(json ? JSON.stringify(output) : formatPush(output));
      } catch (e) {
        handleError(e, json);
      }
    });

  program
    .command("resolve")
    .description("Resolve a date expression")
    .argument("<expression...>", "Date expression, e.g. 'next friday'")
    .option("--from <date>", "Reference date or timestamp (default: now)")
    .option("--json", "Output as JSON")
    .action(
      (expression: string[], options: { from?: string; json?: boolean }) => {
        const json = options.json ?? false;
        try {
          const output = cmdResolve(env, expression.join(" "), options.from);
          if (json) {
            console.log(JSON.stringify(output));
          } else {
            console.log(output ? output.display : "none");
          }
        } catch (e) {
          handleError(e, json);
        }
      },
    );

  return program;
}

export async function main(
  args: string[],
  env: Env = process.env,
): Promise<void> {
  const program = buildProgram(env);
  // Show help when no arguments provided
  if (args.length === 0) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(args, { from: "user" });
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

// Run if executed directly
if (isEntryPoint()) {
  await main(process.argv.slice(2));
}
