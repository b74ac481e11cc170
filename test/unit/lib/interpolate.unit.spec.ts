import { interpolate } from '../../../src/lib/interpolate';

describe('interpolate', () => {
  it('should substitute braced variables', () => {
    const result = interpolate('brewstack/ui:${BREWSTACK_RELEASE}', { BREWSTACK_RELEASE: 'edge' });

    expect(result).toEqual({ value: 'brewstack/ui:edge', missing: [] });
  });

  it('should substitute bare variables and report missing ones', () => {
    const result = interpolate('$DATA_DIR/history', {});

    expect(result).toEqual({ value: '/history', missing: ['DATA_DIR'] });
  });

  it('should use :- defaults for unset and empty values', () => {
    expect(interpolate('${PORT:-80}', {}).value).toBe('80');
    expect(interpolate('${PORT:-80}', { PORT: '' }).value).toBe('80');
    expect(interpolate('${PORT:-80}', { PORT: '8080' }).value).toBe('8080');
  });

  it('should use - defaults for unset values only', () => {
    expect(interpolate('${PORT-80}', {}).value).toBe('80');
    expect(interpolate('${PORT-80}', { PORT: '' }).value).toBe('');
  });

  it('should not report variables that have a default', () => {
    expect(interpolate('${A:-x}${B-y}', {}).missing).toEqual([]);
  });

  it('should unescape $$', () => {
    expect(interpolate('$$HOME and $${X}', {})).toEqual({ value: '$HOME and ${X}', missing: [] });
  });

  it('should list each missing variable once', () => {
    expect(interpolate('${X}-${X}-${Y}', {}).missing).toEqual(['X', 'Y']);
  });
});
