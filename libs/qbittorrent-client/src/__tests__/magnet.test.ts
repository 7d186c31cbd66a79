import { describe, expect, it } from 'vitest';
import { parseMagnetLink } from '../magnet';

describe('parseMagnetLink', () => {
  it('extracts every known parameter', () => {
    const link = parseMagnetLink(
      'magnet:?xt=urn:btih:0123abcd&dn=Example+Files&tr=udp%3A%2F%2Fone.test%3A80&tr=http%3A%2F%2Ftwo.test%2Fannounce&xl=4096&xs=http%3A%2F%2Fsrc.test%2Ff.torrent&kt=example+files&as=http%3A%2F%2Fmirror.test%2Ff',
    );

    expect(link).toEqual({
      hash: '0123abcd',
      displayName: 'Example Files',
      trackers: ['udp://one.test:80', 'http://two.test/announce'],
      exactLength: '4096',
      exactSource: 'http://src.test/f.torrent',
      keywords: 'example files',
      acceptableSource: 'http://mirror.test/f',
    });
  });

  it('keeps a topic without the btih prefix as is', () => {
    expect(parseMagnetLink('magnet:?xt=urn:sha1:ffff').hash).toBe('urn:sha1:ffff');
  });

  it('defaults missing parameters to empty values', () => {
    expect(parseMagnetLink('magnet:?dn=only')).toEqual({
      hash: '',
      displayName: 'only',
      trackers: [],
      exactLength: '',
      exactSource: '',
      keywords: '',
      acceptableSource: '',
    });
  });

  it('rejects other URIs', () => {
    expect(() => parseMagnetLink('http://example.test/file.torrent')).toThrow(
      'invalid magnet link format',
    );
  });
});
