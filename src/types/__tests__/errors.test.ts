import { HeaderReadError, SidecarBackupError, SidecarWriteError } from '../index';

describe('error messages', () => {
  it('should include the message of an error-like cause', () => {
    // Errors raised by fs may not be instances of this realm's Error
    const cause = { code: 'ENOENT', message: "ENOENT: no such file or directory, open 'scan.PAR'" };
    const error = new HeaderReadError('scan.PAR', cause);

    expect(error.message).toBe(
      "Unable to read PAR header: scan.PAR (ENOENT: no such file or directory, open 'scan.PAR')"
    );
    expect(error.name).toBe('HeaderReadError');
    expect(error.cause).toBe(cause);
  });

  it('should include string causes and omit unknown ones', () => {
    expect(new SidecarBackupError('a.json', 'a.json.backup_1', 'disk full').message).toBe(
      'Unable to back up sidecar a.json to a.json.backup_1 (disk full)'
    );
    expect(new SidecarWriteError('a.json', null, 42).message).toBe('Unable to write sidecar JSON: a.json');
  });
});
