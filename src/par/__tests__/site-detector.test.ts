import { DEFAULT_INFERENCE_SETTINGS } from '../../config/inference';
import { detectSite } from '../site-detector';

jest.mock('../../utils/logger');

function header(version: string | null, lines: string[] = []): string {
  const banner = version ? [`# CLINICAL TRYOUT             Research image export tool     V${version}`] : [];
  return [...banner, ...lines].join('\n');
}

describe('detectSite', () => {
  const settings = DEFAULT_INFERENCE_SETTINGS;

  it('should map export tool 4.1 to Groningen with high confidence', () => {
    const result = detectSite(header('4.1'), settings);

    expect(result.toolVersion).toBe('4.1');
    expect(result.siteLabel).toBe('Groningen');
    expect(result.confidence).toBe('High');
    expect(result.heuristic).toBe('tool-version');
    expect(result.characteristics.has('v4.1-format')).toBe(true);
  });

  it('should ignore patient-name markers on 4.1 headers', () => {
    const result = detectSite(
      header('4.1', ['.    Patient name                       :   SUBJ_AMSTERDAM_VUMC']),
      settings,
      '/data/leiden/scan.PAR'
    );

    expect(result.siteLabel).toBe('Groningen');
    expect(result.confidence).toBe('High');
  });

  it('should read the site from a 4.2 patient name', () => {
    const leiden = detectSite(header('4.2', ['.    Patient name                       :   lumc_subject']), settings);
    expect(leiden.siteLabel).toBe('Leiden');
    expect(leiden.confidence).toBe('High');
    expect(leiden.heuristic).toBe('patient-name');

    const amsterdam = detectSite(header('4.2', ['.    Patient name                       :   VUMC_001']), settings);
    expect(amsterdam.siteLabel).toBe('Amsterdam');
  });

  it('should fall back to path markers with medium confidence', () => {
    const result = detectSite(
      header('4.2', ['.    Patient name                       :   SUBJECT_01']),
      settings,
      '/data/Leiden/wave6/scan.PAR'
    );

    expect(result.siteLabel).toBe('Leiden');
    expect(result.confidence).toBe('Medium');
    expect(result.heuristic).toBe('file-path');
  });

  it('should fall back to the subject ID range with medium confidence', () => {
    const below = detectSite(header('4.2', ['.    Examination name                   :   fMRI_110312']), settings);
    expect(below.siteLabel).toBe('Leiden');
    expect(below.confidence).toBe('Medium');
    expect(below.heuristic).toBe('subject-id-range');

    const above = detectSite(header('4.2', ['.    Examination name                   :   fMRI_110612']), settings);
    expect(above.siteLabel).toBe('Amsterdam');
    expect(above.confidence).toBe('Medium');
  });

  it('should skip an anonymised patient name and use the subject ID', () => {
    const result = detectSite(
      header('4.2', [
        '.    Patient name                       :   ANON',
        '.    Examination name                   :   fMRI_110612',
      ]),
      settings
    );

    expect(result.siteLabel).toBe('Amsterdam');
    expect(result.confidence).toBe('Medium');
    expect(result.heuristic).toBe('subject-id-range');
  });

  it('should not read the next line when the patient name is blank', () => {
    const result = detectSite(
      header('4.2', [
        '.    Patient name                       :   ',
        '.    Examination name                   :   LUMC_followup',
      ]),
      settings
    );

    expect(result.siteLabel).toBe('Unspecified');
    expect(result.heuristic).toBe('default');
  });

  it('should report Unspecified when no 4.2 signal matches', () => {
    const result = detectSite(header('4.2', ['.    Examination name                   :   fMRI_999']), settings, '/data/scan.PAR');

    expect(result.siteLabel).toBe('Unspecified');
    expect(result.confidence).toBe('Low');
    expect(result.heuristic).toBe('default');
  });

  it('should skip the subject ID heuristic when disabled', () => {
    const result = detectSite(header('4.2', ['.    Examination name                   :   fMRI_110312']), {
      ...settings,
      subjectIdRange: null,
    });

    expect(result.siteLabel).toBe('Unspecified');
  });

  it('should report Unknown without a recognized tool version', () => {
    expect(detectSite(header(null), settings).siteLabel).toBe('Unknown');

    const v3 = detectSite(header('3'), settings);
    expect(v3.toolVersion).toBe('3');
    expect(v3.siteLabel).toBe('Unknown');
    expect(v3.confidence).toBe('Low');
    expect(v3.heuristic).toBe('none');
  });

  it('should tag header characteristics', () => {
    const result = detectSite(
      header('4.2', [
        '.    SPIR              <0=no 1=yes> ?   :   1',
        '.    Protocol name                      :   WIP bold SENSE',
      ]),
      settings
    );

    expect([...result.characteristics].sort()).toEqual([
      'asl-capable',
      'sense-acceleration',
      'spir-suppression',
      'v4.2-format',
    ]);
  });
});
