#!/usr/bin/env node
/**
 * Manuals CLI Entry Point
 *
 * This is the main entry point for the `manuals` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createCheckCommand } from './commands/check.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
  ConfigError,
} from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

const VERSION = process.env.CLI_VERSION ?? '0.1.0';

const program = new Command();

program
  .name('manuals')
  .description('Preguntas y respuestas sobre manuales de equipos biomédicos, con Azure AI Search + Azure OpenAI')
  .version(VERSION, '-v, --version', 'Muestra el número de versión')
  .helpOption('-h, --help', 'Muestra la ayuda')
  .helpCommand('help [command]', 'Muestra la ayuda de un comando')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Muestra información de depuración', false)
  .option('--json', 'Devuelve los resultados en JSON', false)

  .addHelpText('after', `
${chalk.dim('Ejemplos:')}
  ${chalk.cyan('manuals check')}                              Revisa la configuración de Azure
  ${chalk.cyan('manuals ask "¿Qué indica la alarma E-12?"')}    Hace una pregunta
  ${chalk.cyan('manuals ask "Calibración" -k 5 -t 0.2')}       Más fragmentos, menos aleatoriedad
  ${chalk.cyan('manuals chat')}                               Inicia una sesión interactiva
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Aviso: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// ============================================================================
// COMMANDS
// ============================================================================

// Ask command - one question, answer with sources
program.addCommand(createAskCommand(() => createContext(getGlobalOptions())));

// Chat command - interactive multi-turn REPL
program.addCommand(createChatCommand(() => createContext(getGlobalOptions())));

// Check command - offline configuration check
program.addCommand(createCheckCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Comando desconocido: ${operands[0]}`,
    'Ejecuta: manuals --help  para ver los comandos disponibles'
  );
});

// Validate Azure variables before commands that need them
program.hook('preAction', (_thisCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());

  if (validationOptions.skipSearch && validationOptions.skipGeneration) {
    return;
  }

  const result = validateStartupConfig(validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    if (!opts.json) {
      printStartupValidation(result, opts.verbose);
    }

    if (result.errors.length > 0) {
      throw new ConfigError(
        'La validación de la configuración falló',
        'Corrige los problemas indicados y vuelve a intentarlo (ver: manuals check)'
      );
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
