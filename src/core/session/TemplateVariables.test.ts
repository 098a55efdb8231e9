import { describe, it, expect } from 'vitest';
import {
  computeTemplateVariables,
  formatFileSize,
  formatStatus,
  formatTemplate,
  resolveStatusTemplate,
  toEnvironment,
} from './TemplateVariables';
import { makeSession } from '../../../test/utils';

describe('TemplateVariables', () => {
  it('TV-001: formats file sizes in B, KB and MB', () => {
    expect(formatFileSize(512)).toBe('512 B');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(3 * 1024 * 1024)).toBe('3.0 MB');
  });

  it('TV-002: describes the current item and playback state', () => {
    const session = makeSession(4, { currentIndex: 1, paused: true, repeatCount: 2, speed: 5 });
    expect(computeTemplateVariables(session)).toEqual({
      img_idx: '2',
      img_total: '4',
      img_name: 'img1.png',
      base_name: 'img1',
      extension: '.png',
      img_path: 'img1.png',
      full_path: '/photos/img1.png',
      img_size: 'N/A',
      file_size: '2.0 KB',
      file_bytes: '2000',
      img_size_mb: '0.00',
      speed: '5.0s',
      paused: 'PAUSED',
      repeat: '',
      repeat_count: '2',
      always_on_top: '',
      shuffle: '',
      progress_percent: '50',
    });
  });

  it('TV-003: no variables without items', () => {
    expect(computeTemplateVariables(makeSession(0))).toBeNull();
  });

  it('TV-004: progress is truncated, not rounded', () => {
    const session = makeSession(3, { currentIndex: 0 });
    expect(computeTemplateVariables(session)?.progress_percent).toBe('33');
  });

  it('TV-005: formatTemplate leaves unknown placeholders alone', () => {
    expect(formatTemplate('{a}-{b}-{a}', { a: 'x' })).toBe('x-{b}-x');
  });

  it('TV-006: presets expand, literals pass through', () => {
    expect(resolveStatusTemplate('$2')).toBe('Media {img_idx}/{img_total} (r:{repeat_count})');
    expect(resolveStatusTemplate('{img_name}')).toBe('{img_name}');
  });

  it('TV-007: formatStatus uses the session format', () => {
    const session = makeSession(4, { currentIndex: 3, statusFormat: '$1' });
    expect(formatStatus(session)).toBe('Media 4/4 100%');
    expect(formatStatus(makeSession(2))).toBe('');
  });

  it('TV-008: toEnvironment prefixes and upper-cases names', () => {
    const vars = computeTemplateVariables(makeSession(2, { currentIndex: 1 }));
    expect(vars).not.toBeNull();
    if (!vars) return;
    const env = toEnvironment(vars, '7');
    expect(env.QSS_IMG_NAME).toBe('img1.png');
    expect(env.QSS_IMG_IDX).toBe('2');
    expect(env.QSS_IMG_INDEX).toBe('2');
    expect(env.QSS_TOOL_ID).toBe('7');
    expect(env.QSS_PROGRESS_PERCENT).toBe('100');
    expect(Object.keys(env).every((k) => k.startsWith('QSS_'))).toBe(true);
  });
});
