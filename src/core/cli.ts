import * as fs from 'node:fs/promises';
import { readConfig } from '../config/orchestrator-config.js';
import { errorMessage, OrchestrationConfigError } from '../types/orchestration.js';
import { formatCondition } from '../services/condition-parser.js';
import {
  compileWorkflow,
  parseWorkflowDefinition,
  type CompiledWorkflow,
} from '../services/workflow-definition.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: agent-workflow [command] [options]

Commands:
  validate <file>     Validate a workflow definition (JSON) and print its plan
  config              Print the resolved orchestrator configuration

Options:
  --help, -h          Show this help message
  --json              Output in machine-readable JSON format (validate only)
  --config <path>     Read configuration from <path> (config only)

Examples:
  agent-workflow validate workflows/trip.json
  agent-workflow validate workflows/trip.json --json
  agent-workflow config --config orchestrator.json
`.trim();

const KNOWN_COMMANDS = new Set(['validate', 'config', '--help', '-h']);

// ── Formatting ───────────────────────────────────────────────────────────────

/** Human-readable plan: one line per step in declaration order. */
export function formatWorkflowPlan(compiled: CompiledWorkflow): string {
  const { definition, steps } = compiled;
  const lines = [
    `Workflow '${definition.name}' (${definition.type}, ${steps.length} step(s))`,
  ];

  for (const node of steps) {
    let line = `  ${node.index + 1}. ${node.step.name} [${node.step.requiredAgentType}]`;
    if (node.dependencies.length > 0) {
      line += ` after: ${node.dependencies.join(', ')}`;
    }
    if (node.condition) {
      line += ` if: ${formatCondition(node.condition)}`;
    }
    lines.push(line);
  }

  return lines.join('\n');
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle the `validate` command.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleValidateCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'validate') return false;

  const filePath = argv.slice(1).find((arg) => !arg.startsWith('--'));
  if (!filePath) {
    console.error('[Orchestrator] validate requires a workflow file path.');
    process.exitCode = 1;
    return true;
  }

  const asJson = argv.includes('--json');

  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    const compiled = compileWorkflow(parseWorkflowDefinition(JSON.parse(raw)));
    const output = asJson
      ? JSON.stringify(
          {
            valid: true,
            name: compiled.definition.name,
            type: compiled.definition.type,
            steps: compiled.steps.map((node) => node.step.name),
            roots: compiled.roots.map((index) => compiled.steps[index]?.step.name),
          },
          null,
          2,
        )
      : formatWorkflowPlan(compiled);
    console.log(output);
    process.exitCode = 0;
  } catch (error) {
    if (asJson) {
      console.log(
        JSON.stringify(
          {
            valid: false,
            code: error instanceof OrchestrationConfigError ? error.code : 'unreadable',
            message: errorMessage(error),
          },
          null,
          2,
        ),
      );
    } else {
      console.error(`[Orchestrator] Workflow validation failed: ${errorMessage(error)}`);
      if (error instanceof OrchestrationConfigError) {
        for (const hint of error.hints) {
          console.error(`  - ${hint}`);
        }
      }
    }
    process.exitCode = 2;
  }

  return true;
}

/**
 * Handle the `config` command: print the merged file, default and
 * environment configuration as JSON.
 */
export async function handleConfigCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'config') return false;

  const flagIndex = argv.indexOf('--config');
  const overridePath = flagIndex >= 0 ? argv[flagIndex + 1] : undefined;

  try {
    const config = await readConfig(overridePath);
    console.log(JSON.stringify(config, null, 2));
    process.exitCode = 0;
  } catch (error) {
    console.error(`[Orchestrator] ${errorMessage(error)}`);
    process.exitCode = 1;
  }

  return true;
}

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const command = argv[0];
  if (command === undefined) {
    console.log(HELP_TEXT);
    process.exitCode = 1;
    return true;
  }

  if (KNOWN_COMMANDS.has(command)) {
    return false;
  }

  console.error(`[Orchestrator] Unknown command: '${command}'`);
  console.error(`Run 'agent-workflow --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

/** Dispatch argv to the first handler that recognizes it. */
export async function runCli(argv: string[]): Promise<void> {
  if (handleHelpCli(argv)) return;
  if (handleUnknownCommand(argv)) return;
  if (await handleValidateCli(argv)) return;
  await handleConfigCli(argv);
}
