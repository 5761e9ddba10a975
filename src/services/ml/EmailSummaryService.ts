import OpenAI from 'openai';

export class EmailSummaryService {
  private openai: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string = 'gpt-4o-mini'
  ) {
    this.openai = new OpenAI({
      apiKey: apiKey,
    });
  }

  /**
   * Summarise the kept newsletter blocks into one digest
   */
  async generateSummary(contents: readonly string[]): Promise<string> {
    if (contents.length === 0) {
      throw new Error('Nothing to summarise: no content blocks were kept');
    }

    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: 'system',
          content: this.buildSystemPrompt(contents)
        },
        {
          role: 'user',
          content: 'Summarize the findings into a straightforward and easy to read format.'
        }
      ],
      max_tokens: 1000,
      temperature: 0.2,
    });

    const summary = response.choices[0]?.message?.content?.trim();

    if (!summary) {
      throw new Error('Empty summary received from OpenAI');
    }

    return summary;
  }

  /**
   * Build the system prompt carrying the content to summarise
   */
  private buildSystemPrompt(contents: readonly string[]): string {
    const blocks = contents.map((content, i) => `[${i + 1}] ${content}`).join('\n\n');

    return `You are a helpful newsletter summariser. This is content that is related to the user's interests:

<content>
${blocks}
</content>

You are educational and you do not add any additional information.`;
  }
}
