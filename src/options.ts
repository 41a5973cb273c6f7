import { z } from 'zod';

export type Command = 'init' | 'analyze' | 'mcp';

const COMMANDS: ReadonlySet<string> = new Set(['init', 'analyze', 'mcp']);

const BOOLEAN_FLAGS = new Set(['keep-unused', 'skip-install', 'yes', 'help', 'version']);

const SHORT_FLAGS: Record<string, string> = {
  o: 'output',
  y: 'yes',
  h: 'help',
  v: 'version',
};

export const CliOptionsSchema = z.object({
  output: z.string().min(1, '--output needs a folder name').optional(),
  'keep-unused': z.boolean().default(false),
  'skip-install': z.boolean().default(false),
  match: z.enum(['substring', 'segment']).default('substring'),
  yes: z.boolean().default(false),
  help: z.boolean().default(false),
  version: z.boolean().default(false),
}).strict();

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface ParsedArgs {
  command: Command;
  target?: string;
  options: CliOptions;
}

function isCommand(arg: string | undefined): arg is Command {
  return arg !== undefined && COMMANDS.has(arg);
}

/** Parses `process.argv`; throws for unknown flags or bad values. */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    let key: string | undefined;
    if (arg.startsWith('--')) key = arg.slice(2);
    else if (arg.startsWith('-') && arg.length === 2) key = SHORT_FLAGS[arg[1]] ?? arg.slice(1);

    if (key === undefined) {
      positional.push(arg);
      continue;
    }

    const eq = key.indexOf('=');
    if (eq >= 0) {
      flags[key.slice(0, eq)] = key.slice(eq + 1);
      continue;
    }

    const next = args[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }

  const first = positional[0];
  const command = isCommand(first) ? first : 'init';
  const target = isCommand(first) ? positional[1] : first;

  const parsed = CliOptionsSchema.safeParse(flags);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `--${i.path.join('.')}: ${i.message}` : i.message
    );
    throw new Error(`Invalid options: ${issues.join('; ')}`);
  }

  return { command, target, options: parsed.data };
}
