import { fail, succeed } from '../capabilities/result';
import type { Capability, CapabilityResult, Closeable } from '../capabilities/types';
import type { TextGenerator } from '../llm/types';
import { renderPrompt } from '../../templates/loader';
import { classifyRequestError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { buildRawExtraction, findJsonObject, ResponseParseError } from './parser';
import type { RawExtraction } from './types';

const log = createLogger('EXTRACTION');

const RAW_RESPONSE_PREVIEW = 500;

/**
 * Turns free clinical text into RawExtraction by prompting a text generator
 * and parsing the JSON object out of its reply.
 */
export class EntityExtractionCapability implements Capability<string, RawExtraction>, Closeable {
  readonly kind = 'extraction';
  readonly name = 'entity_extraction';
  readonly description =
    'Extracts structured medical entities from clinical notes including patient info, ' +
    'conditions, medications, vital signs, lab results, procedures, and care plan activities.';

  constructor(
    private readonly generator: TextGenerator,
    private readonly promptName: string = 'extraction'
  ) {}

  async execute(note: string): Promise<CapabilityResult<RawExtraction>> {
    if (!note || !note.trim()) {
      return fail('Empty or whitespace-only clinical note provided');
    }

    let response: string;
    try {
      const prompt = renderPrompt(this.promptName, { note });
      log.info(`Requesting extraction from ${this.generator.provider}/${this.generator.model}`, {
        noteLength: note.length,
      });
      response = await this.generator.generate(prompt);
    } catch (error) {
      log.error('Text generation failed', { error: errorMessage(error) });
      return fail(`Extraction failed: ${errorMessage(error)}`, {
        llmProvider: this.generator.provider,
        llmModel: this.generator.model,
        errorKind: classifyRequestError(error),
      });
    }

    try {
      const extraction = buildRawExtraction(findJsonObject(response));
      log.info('Extraction parsed', {
        conditions: extraction.conditions.length,
        medications: extraction.medications.length,
        procedures: extraction.procedures.length,
      });
      return succeed(extraction, {
        llmProvider: this.generator.provider,
        llmModel: this.generator.model,
        rawResponseLength: response.length,
      });
    } catch (error) {
      if (error instanceof ResponseParseError) {
        log.warn('Model response is not parseable JSON', { error: error.message });
        return fail(`Failed to parse LLM response as JSON: ${error.message}`, {
          rawResponse: response.slice(0, RAW_RESPONSE_PREVIEW),
        });
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.generator.close();
  }
}
