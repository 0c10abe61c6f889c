/**
 * Tests for the scripted-command (.sqf) analyzer
 */
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { extractSqf, SqfAnalyzer } from '../src/analyzers/sqf-analyzer.js';
import { createTempDir, type TempDir } from './fixtures.js';

describe('extractSqf', () => {
  it('collects every quoted literal on a line', () => {
    const { classes, equipment } = extractSqf(['items[] = {"Tarkov_Uniforms_10","ACE_fieldDressing"};']);
    expect(equipment).toEqual(new Set(['Tarkov_Uniforms_10', 'ACE_fieldDressing']));
    expect(classes).toEqual([]);
  });

  it('keeps one entry per distinct literal', () => {
    const { equipment } = extractSqf(['"ItemMap"', '["ItemMap", "ItemMap"]']);
    expect([...equipment]).toEqual(['ItemMap']);
  });

  it('ignores empty literals', () => {
    expect(extractSqf(['_x = "";']).equipment.size).toBe(0);
  });

  it('does not pair quotes across lines', () => {
    const { equipment } = extractSqf(['_a = "open', 'close";']);
    expect(equipment.size).toBe(0);
  });

  it('never reports classes, even for class-like text', () => {
    const { classes, equipment } = extractSqf(['class Fake { item = "x"; };']);
    expect(classes).toEqual([]);
    expect(equipment).toEqual(new Set(['x']));
  });
});

describe('SqfAnalyzer', () => {
  let tmp: TempDir;
  const analyzer = new SqfAnalyzer();

  beforeEach(() => {
    tmp = createTempDir();
  });
  afterEach(() => tmp.cleanup());

  it('extracts equipment from a multi-line array', () => {
    const file = tmp.write('test.sqf', `
    items[] = {
        "Tarkov_Uniforms_10",
        "1Rnd_SmokeBlue_Grenade_shell",
        "ACE_fieldDressing"
    };
    `);
    const result = analyzer.analyze(file);
    expect(result).toEqual({
      file,
      classes: [],
      equipment: new Set(['Tarkov_Uniforms_10', '1Rnd_SmokeBlue_Grenade_shell', 'ACE_fieldDressing']),
    });
  });

  it('returns empty sets for an empty file', () => {
    const result = analyzer.analyze(tmp.write('empty.sqf', ''));
    expect(result.classes).toEqual([]);
    expect(result.equipment.size).toBe(0);
    expect(result.error).toBeUndefined();
  });

  it('handles CRLF line endings', () => {
    const result = analyzer.analyze(tmp.write('crlf.sqf', '"a"\r\n"b"\r\n'));
    expect(result.equipment).toEqual(new Set(['a', 'b']));
  });

  it('wraps a missing file into an error record', () => {
    const missing = `${tmp.root}/nope.sqf`;
    const result = analyzer.analyze(missing);
    expect(result).toEqual({ file: missing, classes: [], equipment: new Set(), error: `File not found: ${missing}` });
  });

  it('run() reports failure as a tagged outcome', () => {
    const outcome = analyzer.run(tmp.root);
    expect(outcome).toEqual({ success: false, file: tmp.root, error: `Path is not a file: ${tmp.root}` });
  });

  it('is idempotent', () => {
    const file = tmp.write('twice.sqf', '["ACRE_PRC343", "ACRE_PRC152"] call fnc_addRadios;');
    expect(analyzer.analyze(file)).toEqual(analyzer.analyze(file));
  });

  it('reads the bundled arsenal sample', () => {
    const result = analyzer.analyze('sample_data/arsenal.sqf');
    expect(result.equipment).toEqual(new Set([
      'sample_uniform_base', 'sample_vest_light', 'ItemMap', 'ItemCompass', 'sample_mag_30rnd_556', 'SmokeShell',
    ]));
  });
});
