import { checkPrerequisites } from '../../../src/prerequisites/checker.js';
import { PrerequisiteError } from '../../../src/shared/errors.js';
import { createTestContext, StubHttp } from '../../helpers/context.js';

describe('checkPrerequisites', () => {
  it('passes with sudo, network and baseline tools present', async () => {
    const { ctx, out } = createTestContext();
    const results = await checkPrerequisites(ctx);
    expect(results).toEqual([
      { name: 'Privileges', status: 'pass', message: 'sudo available' },
      { name: 'Network', status: 'pass', message: 'reached https://github.com' },
      { name: 'Baseline tools', status: 'pass', message: 'curl, git' },
    ]);
    expect(out.lines).toEqual(['[STEP] Checking prerequisites...', '[SUCCESS] Prerequisites check passed']);
  });

  it('warns but continues as root', async () => {
    const { ctx, fake, out } = createTestContext({ profile: { is_root: true } });
    const results = await checkPrerequisites(ctx);
    expect(results[0]).toEqual({ name: 'Privileges', status: 'warn', message: 'running as root' });
    expect(out.lines).toContain('[WARNING] Running as root. Some operations will be adjusted accordingly.');
    expect(fake.ran(/^sudo -n true$/)).toBe(false);
  });

  it('fails without sudo rights in a non-interactive run', async () => {
    const { ctx, fake } = createTestContext();
    fake.on(/^sudo -n true$/, { exitCode: 1, stderr: 'sudo: a password is required' });
    await expect(checkPrerequisites(ctx)).rejects.toThrow('This setup requires sudo privileges. Please run with sudo or as root.');
  });

  it('asks for the sudo password when a terminal is attached', async () => {
    const { ctx, fake } = createTestContext({ interactive: true });
    fake.on(/^sudo -n true$/, { exitCode: 1 });
    const results = await checkPrerequisites(ctx);
    expect(results[0]).toEqual({ name: 'Privileges', status: 'pass', message: 'sudo credentials cached' });
    expect(fake.calls.find((c) => c.argv.join(' ') === 'sudo -v')?.interactive).toBe(true);
  });

  it('accepts a run where only the second host answers', async () => {
    const { ctx } = createTestContext({ http: new StubHttp({ 'https://deb.debian.org': 200 }) });
    const results = await checkPrerequisites(ctx);
    expect(results[1]).toEqual({ name: 'Network', status: 'pass', message: 'reached https://deb.debian.org' });
  });

  it('fails when no host is reachable', async () => {
    const { ctx } = createTestContext({ http: new StubHttp() });
    const failure = checkPrerequisites(ctx);
    await expect(failure).rejects.toThrow(PrerequisiteError);
    await expect(failure).rejects.toThrow('No internet connection detected. Please check your network.');
  });

  it('installs missing baseline tools', async () => {
    const { ctx, fake } = createTestContext();
    fake.available.delete('git');
    fake.on(/^apt install -y git$/, () => {
      fake.available.add('git');
      return {};
    });
    const results = await checkPrerequisites(ctx);
    expect(results[2]).toEqual({ name: 'Baseline tools', status: 'pass', message: 'installed git' });
    expect(fake.ran(/^apt update -y$/)).toBe(true);
  });

  it('fails when the baseline tools stay missing', async () => {
    const { ctx, fake } = createTestContext();
    fake.available.delete('curl');
    fake.available.delete('git');
    await expect(checkPrerequisites(ctx)).rejects.toThrow('Could not install required tools: curl, git');
  });
});
