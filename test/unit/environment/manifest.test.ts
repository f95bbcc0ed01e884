import path from 'path';
import { parseManifest, readManifest } from '../../../src/environment/manifest.js';
import { ManifestNotFoundError } from '../../../src/shared/errors.js';
import { FIXTURES } from '../fake-runner.js';

describe('parseManifest', () => {
  it('keeps specifiers in order and drops comments and blank lines', () => {
    const content = '# header\nrequests>=2.31\n\n  pyyaml  \nnotion-client # inline\r\n';
    expect(parseManifest(content)).toEqual(['requests>=2.31', 'pyyaml', 'notion-client']);
  });

  it('keeps a # that is part of a URL fragment', () => {
    expect(parseManifest('git+https://example.com/repo.git#egg=tool')).toEqual([
      'git+https://example.com/repo.git#egg=tool',
    ]);
  });
});

describe('readManifest', () => {
  it('reads the fixture manifest', async () => {
    const manifestPath = path.join(FIXTURES, 'requirements_prod.txt');
    const manifest = await readManifest(manifestPath);
    expect(manifest).toEqual({
      path: manifestPath,
      specifiers: ['pyyaml>=6.0', 'requests>=2.31', 'openpyxl==3.1.2', 'notion-client>=2.2'],
    });
  });

  it('throws ManifestNotFoundError for a missing file', async () => {
    await expect(readManifest(path.join(FIXTURES, 'no-such-requirements.txt'))).rejects.toBeInstanceOf(
      ManifestNotFoundError
    );
  });
});
