/**
 * Ask Command
 *
 * One question against the manuals, answered from retrieved passages:
 *
 *   manuals ask "¿Qué indica la alarma E-12?"
 *   manuals ask "Procedimiento de calibración" --top-k 5 --temperature 0.2
 *   manuals ask "Repuestos del módulo de bombeo" --json
 *
 * The pipeline never throws for gateway problems; they come back as an
 * outcome with an explanatory answer. Only bad input and missing
 * configuration stop the command.
 */

import { Command } from 'commander';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createRAGPipeline, toAnswerResult } from '../../agent/rag-pipeline.js';
import { parseQuery } from '../../agent/query.js';
import { formatCitationsJSON, type CitationJSON } from '../../agent/citations.js';
import { DEFAULT_TEMPERATURE, DEFAULT_TOP_K, type PipelineOutcomeKind } from '../../agent/types.js';
import { CLIError } from '../../errors/index.js';
import { AskArgsSchema, AskOptionsSchema, validateInput } from '../validation.js';
import { renderAnswer, settleSpinner, SEARCHING_TEXT } from '../utils/answer-renderer.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface AskCommandOptions {
  /** Passages to retrieve, 1-10 */
  topK: string;
  /** Sampling temperature, 0-1 */
  temperature: string;
}

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  outcome: PipelineOutcomeKind;
  answer: string;
  sources: CitationJSON[];
}

const EXAMPLE_HINT =
  'Ejemplo: manuals ask "¿Cómo se calibra el sensor?" --top-k 5 --temperature 0.2';

// ============================================================================
// Command Factory
// ============================================================================

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Pregunta sobre los manuales de los equipos')
    .description('Hace una pregunta y muestra la respuesta con sus fuentes')
    .option('-k, --top-k <number>', 'Fragmentos a recuperar (1-10)', String(DEFAULT_TOP_K))
    .option(
      '-t, --temperature <number>',
      'Temperatura de muestreo (0-1)',
      DEFAULT_TEMPERATURE.toFixed(1)
    )
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      ctx.debug(`Pregunta: "${question}"`);
      ctx.debug(`Opciones: ${JSON.stringify(cmdOptions)}`);

      // ─────────────────────────────────────────────────────────────────────
      // 1. Validate input
      // ─────────────────────────────────────────────────────────────────────
      const args = validateInput(AskArgsSchema, { question });
      if (!args.success) {
        throw new CLIError(args.error, 'Formula una pregunta concreta sobre los manuales');
      }

      const parsed = validateInput(AskOptionsSchema, cmdOptions);
      if (!parsed.success) {
        throw new CLIError(parsed.error, EXAMPLE_HINT);
      }

      const query = parseQuery({
        text: args.data.question,
        topK: parsed.data.topK,
        temperature: parsed.data.temperature,
      });

      // ─────────────────────────────────────────────────────────────────────
      // 2. Build the pipeline (throws ConfigError on missing variables)
      // ─────────────────────────────────────────────────────────────────────
      const config = loadConfig();
      ctx.debug(`Índice: ${config.search.indexName}, despliegue: ${config.openai.deploymentName}`);

      const pipeline = createRAGPipeline(config, { logger: ctx });

      // ─────────────────────────────────────────────────────────────────────
      // 3. Run
      // ─────────────────────────────────────────────────────────────────────
      const spinner = ctx.options.json
        ? null
        : ora({ text: SEARCHING_TEXT, color: 'cyan' }).start();

      const outcome = await pipeline.run(query);
      const result = toAnswerResult(outcome);

      if (spinner) {
        settleSpinner(spinner, outcome);
      }
      ctx.debug(`Resultado: ${outcome.kind}`);

      // ─────────────────────────────────────────────────────────────────────
      // 4. Output
      // ─────────────────────────────────────────────────────────────────────
      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question: query.text,
          outcome: outcome.kind,
          answer: result.answer,
          sources: formatCitationsJSON(result.sources).citations,
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log('');
      renderAnswer(ctx, result);
    });
}
