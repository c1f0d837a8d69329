/**
 * Chat Command
 *
 * Interactive multi-turn REPL over the manuals. Every question is answered
 * independently by the pipeline; the transcript lives here, in the
 * session, and is only used for display.
 *
 *   manuals chat
 *   manuals chat --top-k 5 --temperature 0.3
 *
 * REPL Commands:
 *   /help      - Muestra los comandos disponibles
 *   /clear     - Borra la conversación
 *   /history   - Muestra la conversación con sus fuentes
 *   /settings  - Muestra top-k y temperature
 *   /set X V   - Cambia top-k o temperature
 *   /exit      - Sale del chat (también: exit, quit)
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createRAGPipeline, toAnswerResult, type RAGPipeline } from '../../agent/rag-pipeline.js';
import { parseQuery } from '../../agent/query.js';
import { formatCitations, SOURCES_HEADING } from '../../agent/citations.js';
import {
  DEFAULT_TEMPERATURE,
  DEFAULT_TOP_K,
  type SourceReference,
} from '../../agent/types.js';
import { CLIError } from '../../errors/index.js';
import { getErrorMessage } from '../../providers/error-classification.js';
import {
  AskArgsSchema,
  AskOptionsSchema,
  TemperatureSchema,
  TopKSchema,
  validateInput,
} from '../validation.js';
import { renderAnswer, settleSpinner, SEARCHING_TEXT } from '../utils/answer-renderer.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  topK: string;
  temperature: string;
}

export interface ChatSettings {
  topK: number;
  temperature: number;
}

export interface TranscriptEntry {
  role: 'user' | 'assistant';
  content: string;
  /** Citations of an assistant answer; empty for everything else */
  sources: SourceReference[];
}

/**
 * Conversation state for one REPL session.
 */
export class ChatSession {
  private entries: TranscriptEntry[] = [];
  settings: ChatSettings;

  constructor(settings: ChatSettings) {
    this.settings = { ...settings };
  }

  get transcript(): readonly TranscriptEntry[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  addUser(content: string): void {
    this.entries.push({ role: 'user', content, sources: [] });
  }

  addAssistant(content: string, sources: SourceReference[] = []): void {
    this.entries.push({ role: 'assistant', content, sources });
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Mutable state for the chat REPL.
 */
export interface ChatState {
  session: ChatSession;
  pipeline: RAGPipeline;
}

/**
 * REPL command definition.
 * Handler returns true to continue REPL, false to exit.
 */
interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  usage?: string;
  handler: (args: string[], state: ChatState, ctx: CommandContext) => boolean;
}

// ============================================================================
// Constants
// ============================================================================

/** Prefix of the message recorded when a turn fails unexpectedly */
export const TURN_FAILURE_PREFIX = '❌ Error al procesar la pregunta:';

const PROMPT = chalk.green('> ');

const GOODBYE = '¡Hasta luego!';

// ============================================================================
// Helpers
// ============================================================================

function renderTranscriptEntry(entry: TranscriptEntry, ctx: CommandContext): void {
  if (entry.role === 'user') {
    ctx.log(chalk.cyan(`> ${entry.content}`));
    return;
  }

  ctx.log(entry.content);
  if (entry.sources.length > 0) {
    ctx.log(chalk.bold(SOURCES_HEADING));
    ctx.log(chalk.dim(formatCitations(entry.sources)));
  }
}

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  ctx.log('');
  ctx.log(chalk.bold('Asistente de manuales técnicos'));
  ctx.log(
    chalk.dim(
      `top-k: ${state.session.settings.topK} | temperature: ${state.session.settings.temperature}`
    )
  );
  ctx.log('');
  ctx.log(chalk.dim('Escribe /help para ver los comandos, "exit" para salir'));
  ctx.log('');
}

// ============================================================================
// REPL Commands Registry
// ============================================================================

const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Muestra los comandos disponibles',
    handler: (_args, _state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Comandos disponibles:'));
      ctx.log('');
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0
            ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`)
            : '';
        const usageStr = cmd.usage ? ` ${chalk.cyan(cmd.usage)}` : '';
        ctx.log(`  ${chalk.green('/' + cmd.name)}${usageStr}${aliasStr}`);
        ctx.log(`    ${chalk.dim(cmd.description)}`);
      }
      ctx.log('');
      ctx.log(chalk.dim('Cualquier otro texto se envía como pregunta.'));
      ctx.log('');
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c'],
    description: 'Borra la conversación',
    handler: (_args, state, ctx) => {
      state.session.clear();
      ctx.log(chalk.dim('Conversación borrada.'));
      return true;
    },
  },
  {
    name: 'history',
    aliases: [],
    description: 'Muestra la conversación con sus fuentes',
    handler: (_args, state, ctx) => {
      if (state.session.length === 0) {
        ctx.log(chalk.dim('Todavía no hay mensajes.'));
        return true;
      }
      for (const entry of state.session.transcript) {
        ctx.log('');
        renderTranscriptEntry(entry, ctx);
      }
      ctx.log('');
      return true;
    },
  },
  {
    name: 'settings',
    aliases: [],
    description: 'Muestra los ajustes de búsqueda actuales',
    handler: (_args, state, ctx) => {
      const { topK, temperature } = state.session.settings;
      ctx.log(`${chalk.cyan('top-k:')}       ${topK}`);
      ctx.log(`${chalk.cyan('temperature:')} ${temperature}`);
      return true;
    },
  },
  {
    name: 'set',
    aliases: [],
    description: 'Cambia un ajuste de búsqueda',
    usage: '<top-k|temperature> <valor>',
    handler: (args, state, ctx) => {
      const [key, value] = args;
      if (key === undefined || value === undefined) {
        ctx.log(chalk.yellow('Uso: /set <top-k|temperature> <valor>'));
        return true;
      }

      if (key === 'top-k') {
        const parsed = TopKSchema.safeParse(value);
        if (!parsed.success) {
          ctx.log(chalk.red(parsed.error.issues[0]?.message ?? 'top-k no válido'));
          return true;
        }
        state.session.settings.topK = parsed.data;
      } else if (key === 'temperature') {
        const parsed = TemperatureSchema.safeParse(value);
        if (!parsed.success) {
          ctx.log(chalk.red(parsed.error.issues[0]?.message ?? 'temperature no válida'));
          return true;
        }
        state.session.settings.temperature = parsed.data;
      } else {
        ctx.log(chalk.yellow(`Ajuste desconocido: ${key}`));
        ctx.log(chalk.dim('Ajustes: top-k, temperature'));
        return true;
      }

      ctx.log(chalk.dim(`${key} = ${value.trim()}`));
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'Sale del chat',
    handler: (_args, _state, ctx) => {
      ctx.log(chalk.dim(GOODBYE));
      return false;
    },
  },
];

/**
 * Parse user input to detect REPL commands.
 * Returns null if it's a regular question.
 *
 * @internal Exported for testing purposes
 */
export function parseREPLCommand(
  input: string
): { command: REPLCommand; args: string[] } | null {
  const trimmed = input.trim();

  // "exit" or "quit" without slash
  const bare = /^(exit|quit)$/i.test(trimmed) ? 'exit' : null;
  if (!bare && !trimmed.startsWith('/')) {
    return null;
  }

  const parts = bare ? [bare] : trimmed.slice(1).split(/\s+/);
  const cmdName = parts[0]?.toLowerCase() ?? '';
  const args = parts.slice(1);

  const command = REPL_COMMANDS.find(
    (c) => c.name === cmdName || c.aliases.includes(cmdName)
  );

  if (!command) {
    return null; // Unknown command, treat as question
  }

  return { command, args };
}

// ============================================================================
// Question Handling
// ============================================================================

/**
 * Answer one question and record both sides in the transcript.
 */
async function handleQuestion(
  input: string,
  state: ChatState,
  ctx: CommandContext
): Promise<void> {
  const args = validateInput(AskArgsSchema, { question: input });
  if (!args.success) {
    throw new CLIError(args.error);
  }

  const query = parseQuery({
    text: args.data.question,
    topK: state.session.settings.topK,
    temperature: state.session.settings.temperature,
  });

  state.session.addUser(query.text);

  const spinner = ora({ text: SEARCHING_TEXT, color: 'cyan' }).start();
  const outcome = await state.pipeline.run(query);
  settleSpinner(spinner, outcome);
  ctx.debug(`Resultado: ${outcome.kind}`);

  const result = toAnswerResult(outcome);
  state.session.addAssistant(result.answer, result.sources);

  ctx.log('');
  renderAnswer(ctx, result);
  ctx.log('');
}

/**
 * Process one line of REPL input.
 *
 * Never rejects: a failure while answering is shown and recorded in the
 * transcript, and the session goes on.
 *
 * @returns false when the session should end
 * @internal Exported for testing purposes
 */
export async function handleChatLine(
  line: string,
  state: ChatState,
  ctx: CommandContext
): Promise<boolean> {
  const input = line.trim();
  if (!input) {
    return true;
  }

  const replCmd = parseREPLCommand(input);
  if (replCmd) {
    return replCmd.command.handler(replCmd.args, state, ctx);
  }

  try {
    await handleQuestion(input, state, ctx);
  } catch (error) {
    const message = `${TURN_FAILURE_PREFIX} ${getErrorMessage(error)}`;
    ctx.log(chalk.red(message));
    state.session.addAssistant(message);
  }

  return true;
}

/**
 * Main REPL loop using readline.
 *
 * Event-based (rl.on('line', ...)); resolves when the user exits or the
 * input stream closes.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: PROMPT,
    });

    rl.on('line', async (line) => {
      const shouldContinue = await handleChatLine(line, state, ctx);
      if (!shouldContinue) {
        rl.close();
        return;
      }
      rl.prompt();
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim(GOODBYE));
      rl.close();
    });

    rl.on('close', () => {
      state.session.clear();
      resolve();
    });

    displayWelcome(state, ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Chat interactivo de varios turnos sobre los manuales')
    .option(
      '-k, --top-k <number>',
      'Fragmentos a recuperar por pregunta (1-10)',
      String(DEFAULT_TOP_K)
    )
    .option(
      '-t, --temperature <number>',
      'Temperatura de muestreo (0-1)',
      DEFAULT_TEMPERATURE.toFixed(1)
    )
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      if (ctx.options.json) {
        throw new CLIError(
          'El comando chat no admite --json',
          'Usa: manuals ask "<pregunta>" --json'
        );
      }

      const parsed = validateInput(AskOptionsSchema, cmdOptions);
      if (!parsed.success) {
        throw new CLIError(parsed.error, 'Ejemplo: manuals chat --top-k 5 --temperature 0.2');
      }

      ctx.debug('Iniciando la sesión de chat...');

      const config = loadConfig();
      ctx.debug(`Índice: ${config.search.indexName}, despliegue: ${config.openai.deploymentName}`);

      const state: ChatState = {
        session: new ChatSession(parsed.data),
        pipeline: createRAGPipeline(config, { logger: ctx }),
      };

      await runChatREPL(state, ctx);
    });
}
