import { systemConfig } from '../../../src/components/system-config.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { createTestContext } from '../../helpers/context.js';
import { FakeSystem } from '../../helpers/fake-system.js';

function withTimedatectl(): FakeSystem {
  const fake = new FakeSystem();
  fake.available.add('timedatectl');
  fake.on(/^timedatectl show -p Timezone --value$/, { stdout: 'Etc/UTC\n' });
  fake.on(/^timedatectl list-timezones$/, { stdout: 'Europe/Berlin\nEtc/UTC\nUTC\n' });
  return fake;
}

function withTimezone(timezone: string) {
  return { ...structuredClone(DEFAULT_CONFIG), system: { timezone } };
}

describe('system-config installer', () => {
  it('is never installed without a configured timezone', async () => {
    const { ctx } = createTestContext({ system: withTimedatectl() });
    expect(await systemConfig.isInstalled(ctx)).toBe(false);
  });

  it('compares the configured timezone with the current one', async () => {
    const matching = createTestContext({ system: withTimedatectl(), config: withTimezone('Etc/UTC') });
    expect(await systemConfig.isInstalled(matching.ctx)).toBe(true);
    const differing = createTestContext({ system: withTimedatectl(), config: withTimezone('Europe/Berlin') });
    expect(await systemConfig.isInstalled(differing.ctx)).toBe(false);
  });

  it('applies the configured timezone without asking for one', async () => {
    const fake = withTimedatectl();
    const { ctx, prompter } = createTestContext({ system: fake, config: withTimezone('Europe/Berlin'), answers: ['n'] });
    expect(await systemConfig.install(ctx)).toEqual({ component: 'system-config', status: 'installed', message: 'timezone Europe/Berlin' });
    expect(prompter.asked).toEqual(['Configure system locales with dpkg-reconfigure locales? [y/N]']);
    expect(fake.ran(/^timedatectl set-timezone Europe\/Berlin$/)).toBe(true);
  });

  it('leaves a timezone that already matches the configuration alone', async () => {
    const fake = withTimedatectl();
    const { ctx, out } = createTestContext({ system: fake, config: withTimezone('Etc/UTC'), answers: ['n'] });
    expect(await systemConfig.install(ctx)).toEqual({ component: 'system-config', status: 'skipped', message: 'no changes' });
    expect(out.lines).toContain('[INFO] Timezone already set to Etc/UTC');
    expect(fake.ran(/^timedatectl set-timezone/)).toBe(false);
  });

  it('falls back to the prompt when the configured timezone is unknown', async () => {
    const fake = withTimedatectl();
    const { ctx, out } = createTestContext({ system: fake, config: withTimezone('Mars/Olympus'), answers: ['', 'n'] });
    await systemConfig.install(ctx);
    expect(out.lines).toContain('[ERROR] Configured timezone rejected: Unknown timezone: Mars/Olympus');
    expect(out.lines).toContain('  → Fix system.timezone in the configuration file');
    expect(fake.ran(/^timedatectl set-timezone/)).toBe(false);
  });

  it('re-prompts for an unknown timezone and applies a valid one', async () => {
    const fake = withTimedatectl();
    const { ctx, out, prompter } = createTestContext({ system: fake, answers: ['Mars/Olympus', 'Europe/Berlin', 'n'] });
    const result = await systemConfig.install(ctx);
    expect(result).toEqual({ component: 'system-config', status: 'installed', message: 'timezone Europe/Berlin' });
    expect(prompter.asked[0]).toBe('Timezone (empty keeps Etc/UTC)');
    expect(out.lines).toContain('[ERROR] Unknown timezone: Mars/Olympus');
    expect(fake.ran(/^timedatectl set-timezone Europe\/Berlin$/)).toBe(true);
    expect(fake.count(/^timedatectl set-timezone/)).toBe(1);
  });

  it('keeps the current timezone on empty input', async () => {
    const fake = withTimedatectl();
    const { ctx } = createTestContext({ system: fake, answers: ['', 'n'] });
    expect(await systemConfig.install(ctx)).toEqual({ component: 'system-config', status: 'skipped', message: 'no changes' });
    expect(fake.ran(/^timedatectl set-timezone/)).toBe(false);
  });

  it('falls back to dpkg-reconfigure on Debian without timedatectl', async () => {
    const { ctx, fake } = createTestContext({ answers: ['y', 'y'] });
    fake.available.add('dpkg-reconfigure');
    const result = await systemConfig.install(ctx);
    expect(result.message).toBe('timezone reconfigured, locales reconfigured');
    const reconfigure = fake.calls.filter((c) => c.argv.includes('dpkg-reconfigure'));
    expect(reconfigure.map((c) => c.argv)).toEqual([
      ['sudo', 'dpkg-reconfigure', 'tzdata'],
      ['sudo', 'dpkg-reconfigure', 'locales'],
    ]);
    expect(reconfigure.every((c) => c.interactive === true)).toBe(true);
  });

  it('only prints guidance elsewhere', async () => {
    const { ctx, out } = createTestContext({ profile: { distro: 'fedora', package_manager: 'dnf', family: 'rhel' } });
    expect((await systemConfig.install(ctx)).status).toBe('skipped');
    expect(out.lines).toEqual([
      '[STEP] Configuring system settings...',
      '[INFO] timedatectl is not available; timezone left unchanged',
      "[INFO] Configure locales with 'localectl set-locale' on this system",
    ]);
  });
});
