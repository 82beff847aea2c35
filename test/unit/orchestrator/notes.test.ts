import { postInstallNotes } from '../../../src/orchestrator/notes.js';
import type { ProvisionOutcome } from '../../../src/users/provisioner.js';

const DEV1: ProvisionOutcome = {
  username: 'dev1',
  created: true,
  status: 'configured',
  groups: ['sudo', 'docker'],
  passwordlessSudo: 'enabled',
  profileWritten: true,
  switchTarget: false,
};

describe('postInstallNotes', () => {
  it('lists every follow-up for a full run', () => {
    expect(postInstallNotes({
      results: [
        { component: 'docker', status: 'installed' },
        { component: 'claude-cli', status: 'already_present' },
      ],
      user: DEV1,
      invokingUser: 'alice',
      sudoersDir: '/etc/sudoers.d',
    })).toEqual([
      "Log out and back in (or run 'newgrp docker') to use Docker without sudo",
      'Reload the shell profile: source ~/.bashrc',
      "Authenticate the Claude CLI: run 'claude' and follow the login prompt",
      'Switch to the new user: su - dev1',
      "'dev1' can run sudo without a password; delete /etc/sudoers.d/90-dev1-nopasswd to revoke it",
    ]);
  });

  it('has nothing to say after a base-only run', () => {
    expect(postInstallNotes({
      results: [{ component: 'base', status: 'installed' }],
      user: null,
      invokingUser: 'alice',
      sudoersDir: '/etc/sudoers.d',
    })).toEqual([]);
  });

  it('ignores failed components and users', () => {
    expect(postInstallNotes({
      results: [{ component: 'docker', status: 'failed' }],
      user: { ...DEV1, status: 'failed' },
      invokingUser: 'alice',
      sudoersDir: '/etc/sudoers.d',
    })).toEqual([]);
  });
});
