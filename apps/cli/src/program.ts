import { Command, CommanderError, Option } from 'commander';
import { TaskStore, describeError, isTaskError } from '@tasklog/core';
import * as out from './output.js';
import { runAdd } from './commands/add.js';
import { runDeadline, runSchedule } from './commands/dates.js';
import { runDelete, runPurge } from './commands/delete.js';
import { runDone, runPrune } from './commands/done.js';
import { runDump, runList } from './commands/list.js';
import { runPin } from './commands/pin.js';
import { runUpdate } from './commands/update.js';

export const VERSION = '1.0.0';

export interface CliOptions {
  file?: string;
  verbose?: boolean;
  list?: string | true;
  add?: string[];
  update?: string[];
  done?: string[];
  schedule?: string[];
  deadline?: string[];
  pin?: string[];
  delete?: string[];
  prune?: true;
  purge?: string[];
  dump?: true;
  dumpr?: string;
}

type Action = (store: TaskStore) => void;

/** The mutually exclusive action flags; built fresh because conflicts() mutates an Option */
function actionOptions(): Option[] {
  return [
    new Option('-l, --list [regex]', 'list active task(s) matching REGEX; list all if left empty'),
    new Option('-a, --add <task...>', "add task(s); write --add=DESC for a description starting with '-'"),
    new Option('-u, --update <id_desc...>', 'replace the description of a task: ID DESC'),
    new Option('-d, --done <id...>', 'toggle task(s) done'),
    new Option('-s, --schedule <date_ids...>', "schedule task(s) on a date: DATE [ID...] (YYYY-MM-DD or 'clear')"),
    new Option('--deadline <date_ids...>', "give task(s) a deadline: DATE [ID...] (YYYY-MM-DD or 'clear')"),
    new Option('-p, --pin <id...>', 'toggle pin on task(s)'),
    new Option('--delete <id...>', 'hide task(s) and reassign ids'),
    new Option('--prune', 'hide done task(s) and reassign ids'),
    new Option('--purge <id...>', 'permanently remove task(s) by the ids --dump shows; hidden ids shift afterwards'),
    new Option('--dump', 'list active and hidden tasks'),
    new Option('--dumpr <regex>', 'list active and hidden tasks matching REGEX'),
  ];
}

function selectAction(opts: CliOptions): Action | null {
  const { list, add, update, done, schedule, deadline, pin, prune, purge, dump, dumpr } = opts;
  const hide = opts.delete;

  if (list !== undefined) return store => runList(store, list === true ? null : list);
  if (add) return store => runAdd(store, add);
  if (update) return store => runUpdate(store, update);
  if (done) return store => runDone(store, done);
  if (schedule) return store => runSchedule(store, schedule);
  if (deadline) return store => runDeadline(store, deadline);
  if (pin) return store => runPin(store, pin);
  if (hide) return store => runDelete(store, hide);
  if (prune) return runPrune;
  if (purge) return store => runPurge(store, purge);
  if (dump) return store => runDump(store, null);
  if (dumpr !== undefined) return store => runDump(store, dumpr);
  return null;
}

function execute(opts: CliOptions, program: Command): number {
  out.setVerbose(opts.verbose ?? false);

  const action = selectAction(opts);
  if (action === null) {
    program.outputHelp();
    return 0;
  }

  try {
    const store = new TaskStore(opts.file);
    out.debug(`Task file: ${store.filePath}`);
    action(store);
    return 0;
  } catch (err: unknown) {
    out.error(describeError(err));
    if (!isTaskError(err) && err instanceof Error && err.stack) out.debug(err.stack);
    return 1;
  }
}

/** Build the CLI program. `onExit` receives the exit code of the chosen action. */
export function createProgram(onExit: (code: number) => void): Command {
  const program = new Command()
    .name('tasklog')
    .description('Personal command-line task tracker')
    .version(VERSION)
    .option('-f, --file <path>', 'task file to use instead of the default location')
    .option('-v, --verbose', 'print diagnostic messages')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: out.writeOut, writeErr: out.writeErr });

  const options = actionOptions();
  const names = options.map(o => o.attributeName());
  for (const option of options) {
    const name = option.attributeName();
    program.addOption(option.conflicts(names.filter(n => n !== name)));
  }

  program.action((opts: CliOptions, cmd: Command) => {
    onExit(execute(opts, cmd));
  });

  return program;
}

/** Parse argv (node-style, program path included) and run it; returns the exit code */
export function run(argv: readonly string[]): number {
  let exitCode = 0;
  const program = createProgram(code => {
    exitCode = code;
  });

  try {
    program.parse([...argv]);
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
