import type { MergeRequestRef } from "./types.js";

export const USAGE = `Usage: mr-thread-sync --mr <project>!<iid> --report <violations.json> [options]
       mr-thread-sync --mr <project>!<iid> --delete-all [--except <note id>]

Options:
  --danger-id <id>              Marker id separating this run's comments from other runs
  --new-comment                 Post a fresh summary comment instead of editing the last one
  --remove-previous-comments    Delete earlier summary comments before posting
  --config <path>               Config file (default: config.yaml)
  --help                        Show this help
  --version                     Print the version`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

interface CommonArgs {
  mr: MergeRequestRef;
  configPath: string;
  dangerId?: string;
}

export type CliArgs =
  | { command: "help" }
  | { command: "version" }
  | (CommonArgs & {
      command: "update";
      reportPath: string;
      newComment: boolean;
      removePreviousComments: boolean;
    })
  | (CommonArgs & { command: "delete-all"; except?: string });

const VALUE_FLAGS = new Set(["--mr", "--report", "--danger-id", "--config", "--except"]);
const BOOLEAN_FLAGS = new Set(["--new-comment", "--remove-previous-comments", "--delete-all", "--help", "--version"]);

export function parseMergeRequest(value: string): MergeRequestRef {
  const match = value.match(/^(.+)!(\d+)$/);
  // A project is a namespaced path or a numeric id
  if (!match || !(/^\d+$/.test(match[1]) || /^[^/\s]+(\/[^/\s]+)+$/.test(match[1]))) {
    throw new UsageError(`Invalid --mr format "${value}". Expected group/project!iid or id!iid`);
  }
  const iid = parseInt(match[2], 10);
  if (iid < 1) throw new UsageError(`Invalid merge request iid in "${value}"`);
  return { project: match[1], iid };
}

export function parseArgs(argv: string[]): CliArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`${arg} requires a value`);
      }
      values.set(arg, value);
      i++;
    } else if (BOOLEAN_FLAGS.has(arg)) {
      flags.add(arg);
    } else {
      throw new UsageError(`Unknown argument "${arg}"`);
    }
  }

  if (flags.has("--help")) return { command: "help" };
  if (flags.has("--version")) return { command: "version" };

  const mrValue = values.get("--mr");
  if (!mrValue) throw new UsageError("--mr is required");

  const dangerId = values.get("--danger-id");
  if (dangerId !== undefined && !/^[A-Za-z0-9_.-]+$/.test(dangerId)) {
    throw new UsageError(`Invalid --danger-id "${dangerId}". Use letters, digits, '.', '_' or '-'`);
  }

  const common: CommonArgs = {
    mr: parseMergeRequest(mrValue),
    configPath: values.get("--config") ?? "config.yaml",
    dangerId,
  };

  if (flags.has("--delete-all")) {
    if (values.has("--report")) throw new UsageError("--delete-all does not take a --report");
    return { ...common, command: "delete-all", except: values.get("--except") };
  }

  if (values.has("--except")) throw new UsageError("--except only applies to --delete-all");
  const reportPath = values.get("--report");
  if (!reportPath) throw new UsageError("--report is required unless --delete-all is given");

  return {
    ...common,
    command: "update",
    reportPath,
    newComment: flags.has("--new-comment"),
    removePreviousComments: flags.has("--remove-previous-comments"),
  };
}
