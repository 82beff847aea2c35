import { describeUser, parsePasswdLine, resolveHome } from '../../../src/users/info.js';
import { createTestContext } from '../../helpers/context.js';

describe('parsePasswdLine', () => {
  it('reads home and shell', () => {
    expect(parsePasswdLine('dev1:x:1001:1001:Dev One:/srv/dev1:/bin/zsh\n')).toEqual({ home: '/srv/dev1', shell: '/bin/zsh' });
  });

  it('rejects truncated lines', () => {
    expect(parsePasswdLine('dev1:x:1001')).toBeNull();
  });
});

describe('user info', () => {
  it('resolves the home from the passwd entry', async () => {
    const { ctx, fake } = createTestContext();
    fake.users.set('dev1', { home: '/srv/dev1', shell: '/bin/zsh', groups: new Set(['dev1']) });
    expect(await resolveHome(ctx, 'dev1')).toBe('/srv/dev1');
  });

  it('falls back to /home/<name> for unknown accounts', async () => {
    const { ctx } = createTestContext();
    expect(await resolveHome(ctx, 'ghost')).toBe('/home/ghost');
  });

  it('describes groups and passwordless sudo', async () => {
    const { ctx, fake } = createTestContext();
    fake.addUser('dev1', ['sudo', 'docker']);
    fake.files.set('/etc/sudoers.d/90-dev1-nopasswd', 'dev1 ALL=(ALL) NOPASSWD:ALL\n');
    expect(await describeUser(ctx, 'dev1')).toEqual({
      username: 'dev1',
      home: '/home/dev1',
      shell: '/bin/bash',
      groups: ['dev1', 'docker', 'sudo'],
      passwordlessSudo: true,
    });
  });
});
