import { z } from 'zod';
import { StructuredOutputParser } from '@langchain/core/output_parsers';
import { AIServiceError } from '../../errors/analysis-errors';

/**
 * Shape the model must answer with. Extra keys are rejected.
 */
export const analysisOutputSchema = z
  .object({
    missing_topics: z
      .array(z.string())
      .describe('Topics the document should cover but does not'),
    summary: z.string().min(1).describe('Short summary of the document'),
    insights: z.array(z.string()).describe('Actionable observations'),
  })
  .strict();

export type AnalysisOutput = z.infer<typeof analysisOutputSchema>;

export class AnalysisOutputParser {
  private readonly parser: StructuredOutputParser<typeof analysisOutputSchema> =
    StructuredOutputParser.fromZodSchema<typeof analysisOutputSchema>(
      analysisOutputSchema,
    );

  getFormatInstructions(): string {
    return this.parser.getFormatInstructions();
  }

  /**
   * @throws AIServiceError when the text is not JSON of the expected shape
   */
  async parse(text: string): Promise<AnalysisOutput> {
    try {
      // The parser extracts the JSON; the schema gives the typed result
      const parsed: unknown = await this.parser.parse(text);
      return analysisOutputSchema.parse(parsed);
    } catch (error) {
      throw new AIServiceError('Model output did not match the analysis schema', error);
    }
  }
}
