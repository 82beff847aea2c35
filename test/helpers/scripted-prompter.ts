import type { Prompter, SelectOption } from '../../src/ui/prompter.js';

/** A scripted answer; a string array answers a multiselect, 'default' keeps its initial selection. */
export type Answer = string | readonly string[];

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  private readonly answers: Answer[];

  constructor(answers: readonly Answer[] = []) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  async text(message: string): Promise<string> {
    return this.nextText(message);
  }

  async password(message: string): Promise<string> {
    return this.nextText(message);
  }

  async multiselect<T extends string>(message: string, options: SelectOption<T>[], initial: T[]): Promise<T[]> {
    const answer = this.next(message);
    if (answer === 'default') return initial;
    if (typeof answer === 'string') throw new Error(`Expected a selection for: ${message}`);
    return options.filter((o) => answer.includes(o.value)).map((o) => o.value);
  }

  private nextText(message: string): string {
    const answer = this.next(message);
    if (typeof answer !== 'string') throw new Error(`Expected text for: ${message}`);
    return answer;
  }

  private next(message: string): Answer {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`No scripted answer for: ${message}`);
    return answer;
  }
}
