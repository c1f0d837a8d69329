/**
 * Fixed prompt and user-facing messages.
 *
 * The system prompt is a contract with the model and is not configurable at
 * runtime. The refusal sentence must stay verbatim: the model is asked to
 * emit it word for word when the context is insufficient.
 */

/** Sentence the model must emit when the context does not answer the question */
export const INSUFFICIENT_CONTEXT_REPLY =
  'No encontré información suficiente en los manuales para responder esta pregunta.';

export const SYSTEM_PROMPT = `Eres un asistente especializado para field engineers de dispositivos biomédicos.
Tu función es ayudar a los técnicos a encontrar información en los manuales técnicos y de usuario.

INSTRUCCIONES:
- Usa ÚNICAMENTE la información proporcionada en el contexto de los manuales.
- Si el contexto no contiene información suficiente para responder la pregunta, di claramente: "${INSUFFICIENT_CONTEXT_REPLY}"
- Proporciona respuestas claras, concisas y técnicas.
- Si mencionas procedimientos, sé específico sobre los pasos.
- Si hay información sobre modelos o números de parte, inclúyela en tu respuesta.`;

export const NO_RESULTS_ANSWER =
  'No se encontró información relevante en los manuales para responder tu pregunta. Por favor, intenta reformularla o usar términos más específicos.';

export const EMPTY_CONTENT_ANSWER =
  'Se encontraron documentos pero no contenían texto útil. Por favor, intenta otra pregunta.';

/** First line of every rate-limit answer */
export const RATE_LIMIT_HEADING = '⚠️ **Límite de tasa alcanzado**';

/** First line of every gateway-failure answer */
export const FAILURE_HEADING = '❌ **Error al procesar tu pregunta**';

export function rateLimitAnswer(message: string): string {
  return `${RATE_LIMIT_HEADING}\n\n${message}\n\nPor favor, espera un momento antes de hacer otra pregunta.`;
}

export function failureAnswer(message: string): string {
  return `${FAILURE_HEADING}\n\n${message}\n\nPor favor, intenta de nuevo o verifica tu configuración de Azure.`;
}
