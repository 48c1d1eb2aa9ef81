/**
 * Tests for source/include expression expansion.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  expandExpression,
  expressionMatchesPath,
  hasGlobChars,
  resolveTargets,
} from '../../../../src/core/source/expander.js';

const HOME = '/home/tester';
const BASE = '/etc/tool';

describe('hasGlobChars', () => {
  it('should detect each wildcard character', () => {
    expect(hasGlobChars('*.conf')).toBe(true);
    expect(hasGlobChars('a?.conf')).toBe(true);
    expect(hasGlobChars('[ab].conf')).toBe(true);
  });

  it('should return false for plain paths', () => {
    expect(hasGlobChars('~/hypr/main.conf')).toBe(false);
  });
});

describe('expandExpression', () => {
  it('should expand a leading ~/ to the home directory', () => {
    expect(expandExpression('~/x', BASE, HOME)).toBe('/home/tester/x');
  });

  it('should ignore the base directory for ~/ paths', () => {
    expect(expandExpression('~/x', '/somewhere/else', HOME)).toBe('/home/tester/x');
  });

  it('should substitute $HOME', () => {
    expect(expandExpression('$HOME/x', BASE, HOME)).toBe('/home/tester/x');
  });

  it('should substitute ${HOME}', () => {
    expect(expandExpression('${HOME}/cfg/a.conf', BASE, HOME)).toBe('/home/tester/cfg/a.conf');
  });

  it('should substitute every occurrence of the token', () => {
    expect(expandExpression('$HOME/a$HOME', BASE, '/h')).toBe('/h/a/h');
  });

  it('should insert a home path containing $ literally', () => {
    expect(expandExpression('$HOME/x', BASE, '/home/a$&b')).toBe('/home/a$&b/x');
    expect(expandExpression('${HOME}/x', BASE, '/home/a$$b')).toBe('/home/a$$b/x');
  });

  it('should keep absolute paths unchanged', () => {
    expect(expandExpression('/usr/share/tool/default.conf', BASE, HOME)).toBe(
      '/usr/share/tool/default.conf'
    );
  });

  it('should resolve relative paths from the base directory', () => {
    expect(expandExpression('themes/dark.conf', BASE, HOME)).toBe('/etc/tool/themes/dark.conf');
  });

  it('should trim surrounding whitespace', () => {
    expect(expandExpression('  ./a.conf  ', BASE, HOME)).toBe('/etc/tool/a.conf');
  });

  it('should leave glob characters in place', () => {
    expect(expandExpression('conf.d/*.conf', BASE, HOME)).toBe('/etc/tool/conf.d/*.conf');
  });
});

describe('resolveTargets', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = realpathSync(mkdtempSync(join(tmpdir(), 'confweave-expander-')));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return a single path for non-glob expressions even when missing', () => {
    expect(resolveTargets('missing.conf', tempDir, HOME)).toEqual([join(tempDir, 'missing.conf')]);
  });

  it('should resolve ~/ expressions against the home directory', () => {
    const home = join(tempDir, 'home');
    mkdirSync(home);
    writeFileSync(join(home, 'home.conf'), '');

    expect(resolveTargets('~/home.conf', tempDir, home)).toEqual([join(home, 'home.conf')]);
  });

  it('should return existing files matching a glob, sorted', () => {
    writeFileSync(join(tempDir, 'glob-b.conf'), '');
    writeFileSync(join(tempDir, 'glob-a.conf'), '');
    writeFileSync(join(tempDir, 'other.conf'), '');

    expect(resolveTargets('glob-*.conf', tempDir, HOME)).toEqual([
      join(tempDir, 'glob-a.conf'),
      join(tempDir, 'glob-b.conf'),
    ]);
  });

  it('should exclude directories matched by a glob', () => {
    writeFileSync(join(tempDir, 'a.conf'), '');
    mkdirSync(join(tempDir, 'dir.conf'));

    expect(resolveTargets('*.conf', tempDir, HOME)).toEqual([join(tempDir, 'a.conf')]);
  });

  it('should support ? and character classes', () => {
    writeFileSync(join(tempDir, 'a1.conf'), '');
    writeFileSync(join(tempDir, 'a2.conf'), '');
    writeFileSync(join(tempDir, 'a3.conf'), '');

    expect(resolveTargets('a?.conf', tempDir, HOME)).toHaveLength(3);
    expect(resolveTargets('a[12].conf', tempDir, HOME)).toEqual([
      join(tempDir, 'a1.conf'),
      join(tempDir, 'a2.conf'),
    ]);
  });

  it('should return an empty list when nothing matches', () => {
    expect(resolveTargets('conf.d/*.conf', tempDir, HOME)).toEqual([]);
  });

  it('should return nothing for an unclosed character class', () => {
    writeFileSync(join(tempDir, 'conf['), '');
    writeFileSync(join(tempDir, 'a[].conf'), '');

    expect(resolveTargets('conf[', tempDir, HOME)).toEqual([]);
    expect(resolveTargets('a[].conf', tempDir, HOME)).toEqual([]);
  });

  it('should return nothing when ** is not a whole path component', () => {
    writeFileSync(join(tempDir, 'a.conf'), '');

    expect(resolveTargets('a**.conf', tempDir, HOME)).toEqual([]);
  });

  it('should treat braces as literal characters', () => {
    writeFileSync(join(tempDir, 'a.conf'), '');
    writeFileSync(join(tempDir, 'b.conf'), '');
    writeFileSync(join(tempDir, '{a,b}x.conf'), '');

    expect(resolveTargets('{a,b}*.conf', tempDir, HOME)).toEqual([join(tempDir, '{a,b}x.conf')]);
  });
});

describe('expressionMatchesPath', () => {
  it('should match paths covered by a glob', () => {
    expect(expressionMatchesPath('themes/*.conf', BASE, HOME, '/etc/tool/themes/dark.conf')).toBe(true);
  });

  it('should not match paths outside a glob', () => {
    expect(expressionMatchesPath('themes/*.conf', BASE, HOME, '/etc/tool/other/dark.conf')).toBe(false);
  });

  it('should not let * match across directories', () => {
    expect(expressionMatchesPath('/a/*.conf', BASE, HOME, '/a/x.conf')).toBe(true);
    expect(expressionMatchesPath('/a/*.conf', BASE, HOME, '/a/sub/x.conf')).toBe(false);
  });

  it('should never match with a malformed pattern', () => {
    expect(expressionMatchesPath('conf[', BASE, HOME, '/etc/tool/conf[')).toBe(false);
    expect(expressionMatchesPath('a**.conf', BASE, HOME, '/etc/tool/a.conf')).toBe(false);
  });

  it('should keep a ] right after [ inside the class', () => {
    expect(expressionMatchesPath('/a/[]x].conf', BASE, HOME, '/a/x.conf')).toBe(true);
  });

  it('should require exact equality for non-glob expressions', () => {
    expect(expressionMatchesPath('~/a.conf', BASE, HOME, '/home/tester/a.conf')).toBe(true);
    expect(expressionMatchesPath('~/a.conf', BASE, HOME, '/home/tester/b.conf')).toBe(false);
  });
});
