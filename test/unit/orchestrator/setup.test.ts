import { createDefaultRegistry } from '../../../src/components/index.js';
import { runSetup } from '../../../src/orchestrator/setup.js';
import { PrerequisiteError } from '../../../src/shared/errors.js';
import { createTestContext, StubHttp } from '../../helpers/context.js';
import { FakeSystem } from '../../helpers/fake-system.js';

function ubuntuHost(): FakeSystem {
  const fake = new FakeSystem();
  fake.on(/^git --version$/, { stdout: 'git version 2.43.0\n' });
  return fake;
}

describe('runSetup', () => {
  it('runs only the base installer when only base is selected and reports Docker absent', async () => {
    const fake = ubuntuHost();
    const { ctx, out, prompter } = createTestContext({ system: fake, answers: ['n', ['base'], ''] });

    const report = await runSetup(ctx, createDefaultRegistry(ctx.logger));

    expect(report).toEqual({ user: null, results: [{ component: 'base', status: 'installed', message: '13 packages' }] });
    expect(prompter.asked).toEqual([
      'Would you like to create or configure a user? [y/N]',
      'Select components to install',
      'Proceed with installation? [Y/n]',
    ]);
    expect(fake.ran(/docker-ce/)).toBe(false);
    expect(fake.ran(/^systemctl/)).toBe(false);
    expect(fake.ran(/^git clone/)).toBe(false);
    expect(out.lines).toContain('  - Base packages');
    expect(out.lines).toContain('  ✓ Privileges: sudo available');
    expect(out.lines).toContain('  ✓ Network: reached https://github.com');
    expect(out.lines).toContain('  ✓ Baseline tools: curl, git');
    expect(out.lines).toContain('  ✗ Docker: not installed');
    expect(out.lines).toContain('  ✓ Base packages: installed (13 packages)');
    expect(out.lines).not.toContain('Next steps:');
  });

  it('provisions a user, switches to it and installs in priority order', async () => {
    const fake = ubuntuHost();
    fake.available.add('install');
    fake.on(/^bash -c curl -fsSL https:\/\/download\.docker\.com/, () => {
      fake.files.set('/etc/apt/keyrings/docker.gpg', 'key');
      return {};
    });
    fake.on(/^apt install -y docker-ce/, () => {
      fake.available.add('docker');
      return {};
    });
    fake.on(/^docker --version$/, { stdout: 'Docker version 27.1.1, build 6312585\n' });
    const { ctx, out } = createTestContext({
      system: fake,
      answers: ['y', 'dev1', 'longenough1', 'longenough1', 'y', 'n', 'y', 'y', ['docker', 'base'], ''],
    });

    const report = await runSetup(ctx, createDefaultRegistry(ctx.logger));

    expect(report.user?.switchTarget).toBe(true);
    expect(report.results).toEqual([
      { component: 'base', status: 'installed', message: '13 packages' },
      { component: 'docker', status: 'installed', message: 'docker group: alice, dev1', version: 'Docker version 27.1.1, build 6312585' },
    ]);
    expect(fake.lines.indexOf('apt autoclean')).toBeLessThan(fake.lines.findIndex((l) => l.startsWith('apt install -y docker-ce')));
    expect(fake.users.get('dev1')?.groups).toEqual(new Set(['dev1', 'sudo', 'docker']));
    expect(out.lines).toContain('  /home/dev1/projects');
    expect(out.lines).toContain('  User: dev1');
    expect(out.lines).toContain("User 'dev1':");
    expect(out.lines.slice(-4)).toEqual([
      'Next steps:',
      "  1. Log out and back in (or run 'newgrp docker') to use Docker without sudo",
      '  2. Reload the shell profile: source ~/.bashrc',
      '  3. Switch to the new user: su - dev1',
    ]);
  });

  it('skips everything when the plan is not confirmed', async () => {
    const fake = ubuntuHost();
    const { ctx, out } = createTestContext({ system: fake, answers: ['n', ['base', 'dev-tools'], 'n'] });
    const report = await runSetup(ctx, createDefaultRegistry(ctx.logger));
    expect(report.results).toEqual([
      { component: 'base', status: 'skipped' },
      { component: 'dev-tools', status: 'skipped' },
    ]);
    expect(fake.ran(/^apt (update|install)/)).toBe(false);
    expect(out.lines).toContain('[INFO] Installation cancelled');
  });

  it('warns when nothing is selected', async () => {
    const { ctx, out } = createTestContext({ system: ubuntuHost(), answers: ['n', []] });
    const report = await runSetup(ctx, createDefaultRegistry(ctx.logger));
    expect(report.results).toEqual([]);
    expect(out.lines).toContain('[WARNING] No components selected');
  });

  it('stops before any prompt when prerequisites fail', async () => {
    const { ctx, prompter } = createTestContext({ http: new StubHttp() });
    await expect(runSetup(ctx, createDefaultRegistry(ctx.logger))).rejects.toThrow(PrerequisiteError);
    expect(prompter.asked).toEqual([]);
  });
});
