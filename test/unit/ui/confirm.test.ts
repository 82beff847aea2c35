import { confirm, parseConfirmAnswer } from '../../../src/ui/confirm.js';
import { createLogger } from '../../../src/logger.js';
import { Reporter } from '../../../src/ui/reporter.js';
import { MemorySink } from '../../helpers/context.js';
import { ScriptedPrompter } from '../../helpers/scripted-prompter.js';

describe('parseConfirmAnswer', () => {
  it.each([
    ['y', 'yes'], ['YES', 'yes'], [' n ', 'no'], ['No', 'no'], ['?', 'help'], ['help', 'help'], ['h', 'help'],
  ] as const)('reads %j as %s', (input, expected) => {
    expect(parseConfirmAnswer(input, false)).toBe(expected);
  });

  it('takes the default on empty input', () => {
    expect(parseConfirmAnswer('', true)).toBe('yes');
    expect(parseConfirmAnswer('   ', false)).toBe('no');
  });

  it('returns null for anything else', () => {
    expect(parseConfirmAnswer('maybe', true)).toBeNull();
  });
});

describe('confirm', () => {
  function setup(answers: string[]) {
    const out = new MemorySink();
    const prompter = new ScriptedPrompter(answers);
    const reporter = new Reporter(createLogger(), { out, color: false });
    return { io: { prompter, reporter }, prompter, out };
  }

  it('shows the default in the question', async () => {
    const { io, prompter } = setup(['', '']);
    expect(await confirm(io, 'Install Docker?', { defaultYes: true })).toBe(true);
    expect(await confirm(io, 'Install Docker?')).toBe(false);
    expect(prompter.asked).toEqual(['Install Docker? [Y/n]', 'Install Docker? [y/N]']);
  });

  it('prints help and asks again', async () => {
    const { io, out } = setup(['?', 'y']);
    expect(await confirm(io, 'Enable passwordless sudo?', { help: 'Writes a NOPASSWD rule.' })).toBe(true);
    expect(out.lines).toEqual(['[INFO] Writes a NOPASSWD rule.']);
  });

  it('warns about invalid answers and asks again', async () => {
    const { io, out } = setup(['maybe', 'n']);
    expect(await confirm(io, 'Proceed?', { defaultYes: true })).toBe(false);
    expect(out.lines).toEqual(["[WARNING] Please answer y, n or ? (got 'maybe')"]);
  });

  it('falls back to the default after the attempt limit', async () => {
    const { io, prompter, out } = setup(['x', 'x', 'x']);
    expect(await confirm(io, 'Proceed?', { defaultYes: true, maxAttempts: 3 })).toBe(true);
    expect(prompter.remaining).toBe(0);
    expect(out.lines[3]).toBe('[WARNING] No valid answer after 3 attempts — using default (yes)');
  });
});
