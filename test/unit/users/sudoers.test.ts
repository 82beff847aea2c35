import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { LocalExecutor, type ExecOptions, type ExecResult, type Executor } from '../../../src/execution/executor.js';
import { ConfigurationRollback } from '../../../src/shared/errors.js';
import type { Command } from '../../../src/types/command.js';
import { enablePasswordlessSudo, hasPasswordlessSudo, passwordlessRule, sudoersFragmentPath } from '../../../src/users/sudoers.js';
import { createTestContext } from '../../helpers/context.js';

const FRAGMENT = '/etc/sudoers.d/90-dev1-nopasswd';

describe('sudoers fragment', () => {
  it('names one fragment per user', () => {
    expect(sudoersFragmentPath('/etc/sudoers.d', 'dev1')).toBe(FRAGMENT);
    expect(passwordlessRule('dev1')).toBe('dev1 ALL=(ALL) NOPASSWD:ALL\n');
  });

  it('writes, restricts and validates the fragment', async () => {
    const { ctx, fake, out } = createTestContext();
    expect(await enablePasswordlessSudo(ctx, 'dev1')).toBe(FRAGMENT);
    expect(fake.files.get(FRAGMENT)).toBe('dev1 ALL=(ALL) NOPASSWD:ALL\n');
    expect(fake.modes.get(FRAGMENT)).toBe('0440');
    expect(fake.lines.slice(-3)).toEqual([
      `tee ${FRAGMENT}`,
      `chmod 0440 ${FRAGMENT}`,
      `visudo -c -f ${FRAGMENT}`,
    ]);
    expect(out.lines).toEqual([
      "[STEP] Setting up passwordless sudo for 'dev1'...",
      "[SUCCESS] Passwordless sudo configured for 'dev1'",
      "[WARNING] Security Note: User 'dev1' can now run sudo without password",
    ]);
    expect(await hasPasswordlessSudo(ctx, 'dev1')).toBe(true);
  });

  it('removes a fragment that visudo rejects', async () => {
    const { ctx, fake } = createTestContext();
    fake.on(/^visudo/, { exitCode: 1, stderr: `${FRAGMENT}:1:10: syntax error\n` });
    const failure = await enablePasswordlessSudo(ctx, 'dev1').catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(ConfigurationRollback);
    if (!(failure instanceof ConfigurationRollback)) return;
    expect(failure.path).toBe(FRAGMENT);
    expect(failure.context).toEqual({ path: FRAGMENT, exitCode: 1, stderr: `${FRAGMENT}:1:10: syntax error` });
    expect(fake.files.has(FRAGMENT)).toBe(false);
    expect(await hasPasswordlessSudo(ctx, 'dev1')).toBe(false);
  });

  it('removes the fragment when chmod fails', async () => {
    const { ctx, fake } = createTestContext();
    fake.on(/^chmod 0440/, { exitCode: 1 });
    await expect(enablePasswordlessSudo(ctx, 'dev1')).rejects.toThrow(ConfigurationRollback);
    expect(fake.files.has(FRAGMENT)).toBe(false);
    expect(fake.ran(/^visudo/)).toBe(false);
  });
});

/** Real file operations in a temporary directory; only visudo is simulated. */
class VisudoStub implements Executor {
  private readonly local = new LocalExecutor();

  constructor(private readonly visudoExit: number) {}

  async execute(command: Command, options: ExecOptions): Promise<ExecResult> {
    if (command.argv[0] === 'visudo') {
      return { stdout: '', stderr: this.visudoExit === 0 ? '' : 'parse error', exitCode: this.visudoExit, durationMs: 0 };
    }
    return this.local.execute(command, options);
  }
}

describe('sudoers fragment on disk', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'devhost-sudoers-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  function rootContext(visudoExit: number) {
    const base = createTestContext({ profile: { is_root: true } });
    return {
      ...base.ctx,
      executor: new VisudoStub(visudoExit),
      config: { ...base.ctx.config, paths: { ...base.ctx.config.paths, sudoers_dir: tmpDir } },
    };
  }

  it('leaves a 0440 fragment when validation passes', async () => {
    const fragment = await enablePasswordlessSudo(rootContext(0), 'dev1');
    expect(fragment).toBe(path.join(tmpDir, '90-dev1-nopasswd'));
    expect(await fs.readFile(fragment, 'utf-8')).toBe('dev1 ALL=(ALL) NOPASSWD:ALL\n');
    expect((await fs.stat(fragment)).mode & 0o777).toBe(0o440);
  });

  it('leaves nothing behind when validation fails', async () => {
    await expect(enablePasswordlessSudo(rootContext(1), 'dev1')).rejects.toThrow(ConfigurationRollback);
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });
});
