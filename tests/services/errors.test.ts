import {
  ConfigError,
  EnumerationError,
  FlashError,
  PrivilegeError,
  UnmountError,
  VerificationError,
  describeError,
  errnoOf,
  exitCodeFor,
  isFlasherError,
} from '../../services/errors.js';

describe('flasher errors', () => {
  it('carry their class name and exit code', () => {
    const e = new FlashError('Write failed on /dev/sdz at offset 0: EIO', '/dev/sdz');
    expect(e).toBeInstanceOf(Error);
    expect(e.name).toBe('FlashError');
    expect(e.kind).toBe('flash');
    expect(exitCodeFor(e)).toBe(2);
    expect(exitCodeFor(new EnumerationError('lsblk failed'))).toBe(1);
    expect(exitCodeFor(VerificationError.mismatch(0))).toBe(3);
    expect(exitCodeFor(new UnmountError(['/a'], [], ['/a']))).toBe(4);
    expect(exitCodeFor(new PrivilegeError('pkexec'))).toBe(5);
    expect(exitCodeFor(new ConfigError('Invalid DISKFLASH_CHUNK_SIZE'))).toBe(64);
  });

  it('map anything else to the unexpected exit code', () => {
    expect(isFlasherError(new Error('boom'))).toBe(false);
    expect(exitCodeFor(new Error('boom'))).toBe(99);
  });

  it('explain missing privileges', () => {
    expect(new PrivilegeError('pkexec').message).toBe(
      'Root privileges are required. Install polkit (pkexec) or run the command with sudo.',
    );
  });

  it('list every mountpoint that stayed mounted', () => {
    expect(new UnmountError(['/b', '/a'], [], ['/b', '/a']).message).toBe('Failed to unmount: /b, /a');
  });
});

describe('describeError', () => {
  it('prefers the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError({ code: 5 })).toBe('{"code":5}');
  });
});

describe('errnoOf', () => {
  it('reads the errno code of system errors only', () => {
    expect(errnoOf(Object.assign(new Error('no such file'), { code: 'ENOENT' }))).toBe('ENOENT');
    expect(errnoOf(new Error('boom'))).toBeUndefined();
    expect(errnoOf({ code: 2 })).toBeUndefined();
  });
});
