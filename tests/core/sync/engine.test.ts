import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, utimesSync, writeFileSync,
} from 'node:fs';
import { backup, capture, clearBackups, deploy } from '../../../src/core/sync/engine.js';
import type { SyncContext } from '../../../src/core/sync/engine.js';
import { createSectionCodec, markersFor } from '../../../src/core/sections/codec.js';
import type { SyncEvent } from '../../../src/core/types.js';

const START = "# >>> X's customizations";
const END = "# <<< X's customizations";
const STAMP = '20240102_030405';

describe('sync engine', () => {
  let root: string;
  let events: SyncEvent[];
  let ctx: SyncContext;

  const repoFile = (rel: string, content: string) => write(join(ctx.dotfilesDir, rel), content);
  const homeFile = (rel: string, content: string) => write(join(ctx.homeDir, rel), content);
  const readHome = (rel: string) => readFileSync(join(ctx.homeDir, rel), 'utf-8');
  const readRepo = (rel: string) => readFileSync(join(ctx.dotfilesDir, rel), 'utf-8');

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'dotweave-sync-'));
    events = [];
    ctx = {
      dotfilesDir: join(root, 'dotfiles'),
      homeDir: join(root, 'home'),
      backupsDir: join(root, 'backups'),
      codec: createSectionCodec(markersFor('X')),
      reporter: { emit: event => events.push(event) },
      now: () => new Date(2024, 0, 2, 3, 4, 5),
    };
    mkdirSync(ctx.dotfilesDir, { recursive: true });
    mkdirSync(ctx.homeDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('deploy', () => {
    it('should create a missing home file holding one custom section', () => {
      repoFile('.shellrc', 'export EDITOR=vim\n');

      const summary = deploy(ctx);

      expect(summary.succeeded).toBe(1);
      expect(summary.failed).toBe(0);
      expect(summary.results[0].outcome).toBe('created');
      expect(readHome('.shellrc')).toBe(`${START}\nexport EDITOR=vim\n${END}\n`);
      expect(summary.backupDir).toBe(join(ctx.backupsDir, STAMP));
    });

    it('should replace old custom content, keep user content and back up first', () => {
      const before = `alias ll='ls -la'\n${START}\nold stuff\n${END}\n`;
      repoFile('.shellrc', 'export EDITOR=vim');
      homeFile('.shellrc', before);

      const summary = deploy(ctx);

      expect(readHome('.shellrc')).toBe(`alias ll='ls -la'\n\n${START}\nexport EDITOR=vim\n${END}\n`);
      expect(readFileSync(join(ctx.backupsDir, STAMP, '.shellrc'), 'utf-8')).toBe(before);
      expect(summary.results[0]).toEqual({ relativePath: '.shellrc', outcome: 'updated', backedUp: true });
    });

    it('should leave the home file byte-identical on a second run', () => {
      repoFile('.shellrc', 'export EDITOR=vim\n');
      homeFile('.shellrc', 'alias ll=ls\n');

      deploy(ctx);
      const first = readHome('.shellrc');
      const summary = deploy(ctx);

      expect(readHome('.shellrc')).toBe(first);
      expect(summary.results[0].outcome).toBe('unchanged');
    });

    it('should deploy the sections of a tagged repository file without nesting them', () => {
      repoFile('.zshrc', `${START}\nexport A=1\n${END}\n`);

      const runs = [1, 2, 3].map(() => {
        deploy(ctx);
        return readHome('.zshrc');
      });

      expect(runs[0]).toBe(`${START}\nexport A=1\n${END}\n`);
      expect(runs[1]).toBe(runs[0]);
      expect(runs[2]).toBe(runs[0]);
    });

    it('should join several repository sections into one deployed section', () => {
      repoFile('.zshrc', `${START}\nexport A=1\n${END}\n\n${START}\n${END}\n${START}\nexport B=2\n${END}\n`);
      homeFile('.zshrc', 'user line\n');

      deploy(ctx);
      const first = readHome('.zshrc');
      const summary = deploy(ctx);

      expect(first).toBe(`user line\n\n${START}\nexport A=1\n\nexport B=2\n${END}\n`);
      expect(readHome('.zshrc')).toBe(first);
      expect(summary.results[0].outcome).toBe('unchanged');
    });

    it('should replace sections whose marker lines carry surrounding blanks', () => {
      repoFile('.shellrc', 'export EDITOR=vim\n');
      homeFile('.shellrc', `alias ll=ls\n   ${START}\nold\n${END}  \n`);

      deploy(ctx);
      const first = readHome('.shellrc');
      deploy(ctx);

      expect(first).toBe(`alias ll=ls\n\n${START}\nexport EDITOR=vim\n${END}\n`);
      expect(readHome('.shellrc')).toBe(first);
    });

    it('should replace the section of a CRLF home file instead of adding another', () => {
      repoFile('.shellrc', 'export EDITOR=vim\n');
      homeFile('.shellrc', `alias ll=ls\r\n${START}\r\nold\r\n${END}\r\n`);

      deploy(ctx);

      expect(readHome('.shellrc')).toBe(`alias ll=ls\n\n${START}\nexport EDITOR=vim\n${END}\n`);
    });

    it('should create nested targets', () => {
      repoFile('.config/kitty/kitty.conf', 'font_size 14\n');

      deploy(ctx);

      expect(readHome('.config/kitty/kitty.conf')).toBe(`${START}\nfont_size 14\n${END}\n`);
    });

    it('should reuse a given backup directory', () => {
      const runDir = join(ctx.backupsDir, 'run');
      repoFile('.vimrc', 'set number\n');
      homeFile('.vimrc', 'syntax on\n');

      const summary = deploy(ctx, { backupDir: runDir });

      expect(summary.backupDir).toBe(runDir);
      expect(readFileSync(join(runDir, '.vimrc'), 'utf-8')).toBe('syntax on\n');
    });

    it('should count an unreadable target as a failure and continue', () => {
      repoFile('.a', 'a\n');
      repoFile('.b', 'b\n');
      mkdirSync(join(ctx.homeDir, '.a'));

      const summary = deploy(ctx);

      expect(summary.failed).toBe(1);
      expect(summary.succeeded).toBe(1);
      expect(summary.results[0].reason).toBe('io_error');
      expect(readHome('.b')).toBe(`${START}\nb\n${END}\n`);
    });

    it('should stream one event per file between start and summary', () => {
      repoFile('.a', 'a\n');
      repoFile('.b', 'b\n');

      deploy(ctx);

      expect(events.map(e => e.type)).toEqual(['start', 'file', 'file', 'summary']);
    });
  });

  describe('capture', () => {
    it('should recover exactly the deployed payload', () => {
      repoFile('.shellrc', 'export EDITOR=vim\n');
      deploy(ctx);
      repoFile('.shellrc', 'something else\n');

      const summary = capture(ctx, { paths: ['.shellrc'] });

      expect(summary.succeeded).toBe(1);
      expect(summary.results[0].outcome).toBe('captured');
      expect(readRepo('.shellrc')).toBe('export EDITOR=vim\n');
    });

    it('should join non-empty sections with a blank line', () => {
      homeFile('multi', `${START}\none\n${END}\nuser\n${START}\n\n${END}\n${START}\ntwo\n${END}\n`);

      capture(ctx, { paths: ['multi'] });

      expect(readRepo('multi')).toBe('one\n\ntwo\n');
    });

    it('should capture sections from a CRLF home file', () => {
      homeFile('.shellrc', `user\r\n${START}\r\nexport A=1\r\n${END}\r\n`);

      const summary = capture(ctx, { paths: ['.shellrc'] });

      expect(summary.results[0].outcome).toBe('captured');
      expect(readRepo('.shellrc')).toBe('export A=1\n');
    });

    it('should fail a path with no home counterpart', () => {
      const summary = capture(ctx, { paths: ['nope/missing'] });

      expect(summary.failed).toBe(1);
      expect(summary.succeeded).toBe(0);
      expect(summary.results[0].reason).toBe('missing_source');
    });

    it('should fail a file without custom sections and leave the repository alone', () => {
      homeFile('plain', 'just text\n');

      const summary = capture(ctx, { paths: ['plain'] });

      expect(summary.results[0].reason).toBe('no_custom_content');
      expect(existsSync(join(ctx.dotfilesDir, 'plain'))).toBe(false);
    });

    it('should reject paths outside the dotfiles root', () => {
      const summary = capture(ctx, { paths: ['../escape', '/etc/hosts'] });

      expect(summary.failed).toBe(2);
      expect(summary.results.map(r => r.reason)).toEqual(['invalid_path', 'invalid_path']);
    });

    it('should process a repeated path once', () => {
      homeFile('a', `${START}\nx\n${END}\n`);

      const summary = capture(ctx, { paths: ['a', './a'] });

      expect(summary.results).toHaveLength(1);
    });

    it('should capture every tracked file when no paths are given', () => {
      repoFile('.a', 'old a\n');
      repoFile('.b', 'old b\n');
      homeFile('.a', `${START}\nnew a\n${END}\n`);

      const summary = capture(ctx);

      expect(summary.succeeded).toBe(1);
      expect(summary.failed).toBe(1);
      expect(readRepo('.a')).toBe('new a\n');
      expect(readRepo('.b')).toBe('old b\n');
      expect(events.some(e => e.type === 'notice')).toBe(true);
    });
  });

  describe('backup', () => {
    it('should copy existing files into a standalone directory and count missing ones', () => {
      const mtime = new Date('2020-01-01T00:00:00Z');
      repoFile('.a', 'repo a\n');
      repoFile('.b', 'repo b\n');
      homeFile('.a', 'home a\n');
      utimesSync(join(ctx.homeDir, '.a'), mtime, mtime);

      const summary = backup(ctx, { standalone: true });
      const copy = join(ctx.backupsDir, '_standalones', STAMP, '.a');

      expect(summary.backupDir).toBe(join(ctx.backupsDir, '_standalones', STAMP));
      expect(summary.succeeded).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.results[1].reason).toBe('missing_source');
      expect(readFileSync(copy, 'utf-8')).toBe('home a\n');
      expect(statSync(copy).mtime.getTime()).toBe(mtime.getTime());
      expect(readRepo('.a')).toBe('repo a\n');
    });

    it('should write full-run backups directly under the backup root', () => {
      repoFile('.a', 'a\n');
      homeFile('.a', 'a\n');

      const summary = backup(ctx);

      expect(summary.backupDir).toBe(join(ctx.backupsDir, STAMP));
    });
  });

  describe('clearBackups', () => {
    it('should treat a missing backup root as a no-op', () => {
      const result = clearBackups(ctx);

      expect(result).toEqual({ cleared: false, path: ctx.backupsDir });
      expect(events).toContainEqual({ type: 'notice', message: 'No backups directory found' });
    });

    it('should delete the whole backup root', () => {
      repoFile('.a', 'a\n');
      homeFile('.a', 'a\n');
      backup(ctx, { standalone: true });

      const result = clearBackups(ctx);

      expect(result.cleared).toBe(true);
      expect(existsSync(ctx.backupsDir)).toBe(false);
    });
  });
});

function write(path: string, content: string): void {
  mkdirSync(join(path, '..'), { recursive: true });
  writeFileSync(path, content, 'utf-8');
}
