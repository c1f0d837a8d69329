/**
 * Answer Renderers
 *
 * Shared by `ask` and `chat`: settle the spinner according to how the
 * pipeline run ended, then print the answer and its sources.
 *
 * ```
 * pipeline.run()
 *     │
 *     ├── settleSpinner()   → ✔ / ℹ / ⚠ / ✖ line
 *     │
 *     └── renderAnswer()    → answer text + "📚 Fuentes utilizadas:" list
 * ```
 */

import chalk from 'chalk';
import type { Ora } from 'ora';
import { formatCitations, SOURCES_HEADING } from '../../agent/citations.js';
import type { AnswerResult, PipelineOutcome } from '../../agent/types.js';
import type { CommandContext } from '../types.js';

/** Shown while a question is being answered */
export const SEARCHING_TEXT = 'Buscando en los manuales y generando respuesta...';

export type OutcomeSpinner = Pick<Ora, 'succeed' | 'info' | 'warn' | 'fail'>;

/**
 * Stop the spinner with a line that reflects the outcome.
 */
export function settleSpinner(spinner: OutcomeSpinner, outcome: PipelineOutcome): void {
  switch (outcome.kind) {
    case 'success':
      spinner.succeed(chalk.dim(`Respuesta generada con ${outcome.sources.length} fuente(s)`));
      break;
    case 'no_results':
      spinner.info(chalk.dim('Sin resultados en el índice'));
      break;
    case 'empty_content':
      spinner.info(chalk.dim(`${outcome.retrievedCount} documento(s) sin texto útil`));
      break;
    case 'rate_limited':
      spinner.warn(chalk.yellow('Límite de tasa alcanzado'));
      break;
    case 'gateway_failure':
      spinner.fail(chalk.red('Error al consultar Azure'));
      break;
  }
}

/**
 * Print the answer followed by its sources, if any.
 */
export function renderAnswer(ctx: CommandContext, result: AnswerResult): void {
  ctx.log(result.answer);

  if (result.sources.length > 0) {
    ctx.log('');
    ctx.log(chalk.dim('---'));
    ctx.log(chalk.bold(SOURCES_HEADING));
    ctx.log(chalk.dim(formatCitations(result.sources)));
  }
}
