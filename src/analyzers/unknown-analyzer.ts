import { emptyFields, type AnalyzerInput, type AnalyzerOutput, type ContentAnalyzer } from './types';

/**
 * Resources that resolve to no known kind carry no fields and neutral
 * scoring signals. The record still reports status, timing and HTTP data.
 */
export class UnknownAnalyzer implements ContentAnalyzer {
  readonly contentType = 'unknown' as const;

  async analyze(_input: AnalyzerInput): Promise<AnalyzerOutput> {
    return {
      fields: emptyFields(),
      signals: { hasStructuredMetadata: false, boilerplateRatio: 1, languageConfidence: 0 },
    };
  }
}
