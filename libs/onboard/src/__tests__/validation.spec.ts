import { validateUserForm } from '../validation';

const VALID = { username: 'alice', password: 'test-secret', confirm: 'test-secret' };

describe('validateUserForm', () => {
  it('accepts a complete form', () => {
    expect(validateUserForm(VALID, 8)).toBeNull();
  });

  it('requires a username first', () => {
    expect(validateUserForm({ username: '', password: '', confirm: 'x' }, 8)).toBe('Username is required');
  });

  it('restricts username characters', () => {
    expect(validateUserForm({ ...VALID, username: 'al ice' }, 8)).toBe(
      'Username can only contain letters, numbers, underscore, and dash',
    );
    expect(validateUserForm({ ...VALID, username: 'dev_user-2' }, 8)).toBeNull();
  });

  it('limits usernames to 32 bytes', () => {
    expect(validateUserForm({ ...VALID, username: 'a'.repeat(33) }, 8)).toBe('Username must be 32 bytes or less');
    expect(validateUserForm({ ...VALID, username: 'a'.repeat(32) }, 8)).toBeNull();
    expect(validateUserForm({ ...VALID, username: 'é'.repeat(17) }, 8)).toBe('Username must be 32 bytes or less');
    expect(validateUserForm({ ...VALID, username: 'é'.repeat(16) }, 8)).toBeNull();
  });

  it('checks the password after the username', () => {
    expect(validateUserForm({ username: 'alice', password: '', confirm: '' }, 8)).toBe('Password is required');
    expect(validateUserForm({ username: 'alice', password: 'short', confirm: 'short' }, 8)).toBe(
      'Password must be at least 8 characters',
    );
  });

  it('uses the configured minimum length', () => {
    expect(validateUserForm({ username: 'alice', password: 'abcd', confirm: 'abcd' }, 4)).toBeNull();
  });

  it('requires the confirmation to match', () => {
    expect(validateUserForm({ ...VALID, confirm: 'test-secreT' }, 8)).toBe('Passwords do not match');
  });
});
