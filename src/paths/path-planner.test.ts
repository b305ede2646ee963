import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { planPaths, planPlaylistTemplate } from './path-planner.js';

describe('planPaths', () => {
  const root = join('/downloads');

  it('should lay out course folder and padded file name', () => {
    const paths = planPaths(root, 'Learning TypeScript', 7, 'Generics: the basics');

    expect(paths.directory).toBe(join(root, 'Learning TypeScript'));
    expect(paths.stem).toBe(join(root, 'Learning TypeScript', '007 - Generics_ the basics'));
    expect(paths.videoPath).toBe(`${join(root, 'Learning TypeScript', '007 - Generics_ the basics')}.%(ext)s`);
    expect(paths.subtitlePath).toBe(`${join(root, 'Learning TypeScript', '007 - Generics_ the basics')}.en.srt`);
  });

  it('should add a numbered section folder', () => {
    const paths = planPaths(root, 'Course', 12, 'Wrap up', { section: { number: 3, title: 'Advanced / Extras' } });

    expect(paths.directory).toBe(join(root, 'Course', '03 - Advanced _ Extras'));
    expect(paths.stem).toBe(join(root, 'Course', '03 - Advanced _ Extras', '012 - Wrap up'));
  });

  it('should use the section title alone when it has no number', () => {
    const paths = planPaths(root, 'Course', 1, 'Intro', { section: { number: null, title: 'Getting started' } });
    expect(paths.directory).toBe(join(root, 'Course', 'Getting started'));
  });

  it('should widen the index for large courses', () => {
    const paths = planPaths(root, 'Big', 5, 'Five', { itemCount: 1200 });
    expect(paths.stem).toBe(join(root, 'Big', '0005 - Five'));
  });

  it('should sort files in play order', () => {
    const names = [10, 2, 1, 100].map((i) => planPaths(root, 'C', i, 'x', { itemCount: 100 }).stem);
    expect([...names].sort()).toEqual([1, 2, 10, 100].map((i) => planPaths(root, 'C', i, 'x', { itemCount: 100 }).stem));
  });

  it('should use the requested subtitle language', () => {
    const paths = planPaths(root, 'C', 1, 'x', { subtitleLanguage: 'de' });
    expect(paths.subtitlePath).toBe(`${join(root, 'C', '001 - x')}.de.srt`);
  });

  it('should escape percent signs in the output template only', () => {
    const paths = planPaths(root, '100% Course', 1, 'Save 50%');

    expect(paths.stem).toBe(join(root, '100% Course', '001 - Save 50%'));
    expect(paths.videoPath).toBe(`${join(root, '100%% Course', '001 - Save 50%%')}.%(ext)s`);
  });

  it('should be stable for already sanitized titles', () => {
    const first = planPaths(root, 'A: B', 1, 'C?');
    const second = planPaths(root, 'A_ B', 1, 'C_');
    expect(second).toEqual(first);
  });

  it('should reject non-positive indexes', () => {
    expect(() => planPaths(root, 'C', 0, 'x')).toThrow(RangeError);
    expect(() => planPaths(root, 'C', 1.5, 'x')).toThrow('Item index must be a positive integer, got 1.5');
  });
});

describe('planPlaylistTemplate', () => {
  it('should build a flat template', () => {
    expect(planPlaylistTemplate('/dl', false)).toBe(
      join('/dl', '%(playlist_title,playlist|Untitled)s', '%(playlist_index)03d - %(title)s.%(ext)s'),
    );
  });

  it('should add the chapter folder for sectioned sites', () => {
    expect(planPlaylistTemplate('/dl', true)).toBe(
      join(
        '/dl',
        '%(playlist_title,playlist|Untitled)s',
        '%(chapter_number)02d - %(chapter|Untitled)s',
        '%(playlist_index)03d - %(title)s.%(ext)s',
      ),
    );
  });
});
