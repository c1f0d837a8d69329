/**
 * Check Command
 *
 * Offline configuration check, no request is sent to Azure:
 *   manuals check              - Show which variables are set
 *   manuals check --json       - Same, as JSON
 *   manuals check --template   - Print a .env template
 *
 * Checks performed:
 * 1. Every required variable is set (error if missing)
 * 2. Endpoints use https (warning otherwise)
 * 3. The full configuration parses (error if a value is malformed)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { hasEnv, REQUIRED_ENV_VARS } from '../../config/env.js';
import { loadConfig } from '../../config/loader.js';
import { validateStartupConfig } from '../../config/startup-validation.js';
import { ENV_TEMPLATE } from '../../config/defaults.js';
import { ConfigError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckIssue {
  severity: 'error' | 'warning';
  message: string;
  hint: string;
}

export interface CheckResultJSON {
  ready: boolean;
  variables: Array<{ name: string; set: boolean }>;
  issues: CheckIssue[];
}

interface CheckCommandOptions {
  template?: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Collect configuration issues without throwing.
 */
export function collectConfigIssues(): CheckIssue[] {
  const issues: CheckIssue[] = [];
  const validation = validateStartupConfig();

  for (const error of validation.errors) {
    issues.push({
      severity: 'error',
      message: error,
      hint: 'Añádela al archivo .env (ver: manuals check --template)',
    });
  }

  for (const warning of validation.warnings) {
    issues.push({
      severity: 'warning',
      message: warning,
      hint: 'Los endpoints de Azure suelen usar https://',
    });
  }

  // Presence is already reported above; only check value shapes here.
  if (validation.valid) {
    try {
      loadConfig();
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      issues.push({
        severity: 'error',
        message: error.message,
        hint: error.hint ?? 'Revisa los valores de tu archivo .env',
      });
    }
  }

  return issues;
}

// ============================================================================
// Command Factory
// ============================================================================

export function createCheckCommand(getContext: () => CommandContext): Command {
  return new Command('check')
    .description('Revisa la configuración de Azure sin conectarse a Azure')
    .option('--template', 'Imprime una plantilla de .env y sale')
    .action((cmdOptions: CheckCommandOptions) => {
      const ctx = getContext();

      if (cmdOptions.template) {
        console.log(ENV_TEMPLATE);
        return;
      }

      const variables = REQUIRED_ENV_VARS.map((name) => ({ name, set: hasEnv(name) }));
      const issues = collectConfigIssues();
      const ready = !issues.some((i) => i.severity === 'error');
      ctx.debug(`Revisión: ${issues.length} problema(s), ready=${ready}`);

      if (!ready) {
        process.exitCode = 1;
      }

      if (ctx.options.json) {
        const output: CheckResultJSON = { ready, variables, issues };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      const lines: string[] = [];

      lines.push(
        chalk.bold('Configuración') +
          (ready ? chalk.green(' (lista)') : chalk.red(' (incompleta)'))
      );
      lines.push(chalk.dim('─'.repeat(40)));
      for (const variable of variables) {
        const icon = variable.set ? chalk.green('✓') : chalk.red('✗');
        lines.push(`  ${icon} ${variable.name}`);
      }

      if (issues.length > 0) {
        lines.push('');
        lines.push(chalk.bold('Problemas:'));
        for (const issue of issues) {
          const icon = issue.severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
          lines.push(`  ${icon} ${issue.message}`);
          lines.push(chalk.dim(`    ${issue.hint}`));
        }
      } else {
        lines.push('');
        lines.push(chalk.green('Sin problemas. Todo listo para preguntar.'));
      }

      ctx.log(lines.join('\n'));
    });
}
