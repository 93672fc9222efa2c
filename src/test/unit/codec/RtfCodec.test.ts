/**
 * Unit tests for the RTF clipboard codec
 */
import { describe, it, expect, vi } from 'vitest';
import { styledToRtf, rtfToStyled, isRtf, MAX_RTF_SIZE } from '../../../lib/codec/RtfCodec';
import { PLAIN, BOLD, UNDERLINE, BOLD_UNDERLINE, styled } from '../../../lib/text/types';
import { build } from '../../helpers/documentFixtures';

/**
 * The document text after the preamble, including the closing brace.
 */
function body(rtf: string): string {
  const marker = '\\fs24 ';
  return rtf.slice(rtf.indexOf(marker) + marker.length);
}

describe('RtfCodec', () => {
  describe('styledToRtf()', () => {
    it('should write an RTF document', () => {
      const rtf = styledToRtf(styled('Hello world'));

      expect(rtf.startsWith('{\\rtf1\\ansi')).toBe(true);
      expect(isRtf(rtf)).toBe(true);
      expect(body(rtf)).toBe('Hello world}');
    });

    it('should group styled runs', () => {
      const value = build('Normal ', ['Bold', BOLD], ' ', ['Under', UNDERLINE], ' ', ['Both', BOLD_UNDERLINE]);

      expect(body(styledToRtf(value))).toBe('Normal {\\b Bold} {\\ul Under} {\\b\\ul Both}}');
    });

    it('should escape backslashes and braces', () => {
      expect(body(styledToRtf(styled('a\\b{c}')))).toBe('a\\\\b\\{c\\}}');
    });

    it('should write non-ASCII characters as signed 16-bit escapes', () => {
      expect(body(styledToRtf(styled('Test ø')))).toBe('Test \\u248?}');
      expect(body(styledToRtf(styled('\u{1F600}')))).toBe('\\u-10179?\\u-8704?}');
    });

    it('should end paragraphs with \\par', () => {
      const value = build(['one', BOLD], '\n\ntwo');

      expect(body(styledToRtf(value))).toBe('{\\b one}\\par\n\\par\ntwo}');
    });

    it('should write an empty document for empty text', () => {
      expect(body(styledToRtf(styled('')))).toBe('}');
    });
  });

  describe('rtfToStyled()', () => {
    it('should read groups as styles', () => {
      const value = rtfToStyled(String.raw`{\rtf1\ansi\deff0 Normal {\b Bold} Text}`);

      expect(value).toEqual(build('Normal ', ['Bold', BOLD], ' Text'));
    });

    it('should skip header destinations', () => {
      const rtf = [
        String.raw`{\rtf1\ansi\ansicpg1252\cocoartf2639`,
        String.raw`{\fonttbl\f0\fswiss\fcharset0 Helvetica;}`,
        String.raw`{\colortbl;\red255\green255\blue255;}`,
        String.raw`{\*\expandedcolortbl;;}`,
        String.raw`\pard\tx560\pardirnatural\partightenfactor0`,
        '',
        String.raw`\f0\fs24 \cf0 Caf\'e9 {\b cr\'e8me}}`
      ].join('\n');

      expect(rtfToStyled(rtf)).toEqual(build('Café ', ['crème', BOLD]));
    });

    it('should switch attributes off', () => {
      const value = rtfToStyled('{\\rtf1 a\\b b\\b0 c\\ul d\\ulnone e\\ul f\\ul0 g}');

      expect(value.text).toBe('abcdefg');
      expect(value.styles).toEqual([PLAIN, BOLD, PLAIN, UNDERLINE, PLAIN, UNDERLINE, PLAIN]);
    });

    it('should read unicode escapes and skip their fallback', () => {
      expect(rtfToStyled('{\\rtf1 Test \\u248? and \\u-10179?\\u-8704?}').text).toBe('Test ø and \u{1F600}');
      expect(rtfToStyled('{\\rtf1\\uc0\\u8212 x}').text).toBe('\u2014x');
      expect(rtfToStyled('{\\rtf1 \\u128512?}')).toEqual(styled('\u{1F600}'));
    });

    it('should read escaped characters', () => {
      expect(rtfToStyled(String.raw`{\rtf1 a\\b\{c\}}`).text).toBe('a\\b{c}');
    });

    it('should keep an invalid hex escape as text', () => {
      expect(rtfToStyled(String.raw`{\rtf1 Test \'zz invalid}`).text).toBe('Test zz invalid');
    });

    it('should turn \\par and \\line into plain paragraph separators', () => {
      expect(rtfToStyled(String.raw`{\rtf1 {\b one\par two}}`)).toEqual(build(['one', BOLD], '\n', ['two', BOLD]));
      expect(rtfToStyled(String.raw`{\rtf1 a\line b}`).text).toBe('a\nb');
    });

    it('should ignore line breaks in the RTF source', () => {
      expect(rtfToStyled('{\\rtf1 one\r\ntwo}').text).toBe('onetwo');
    });

    it('should take text without an RTF header as plain text', () => {
      expect(rtfToStyled('plain\r\ntext')).toEqual(styled('plain\ntext'));
    });

    it('should ignore RTF over the size limit', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const rtf = String.raw`{\rtf1 ` + 'A'.repeat(20) + '}';

      expect(rtfToStyled(rtf, { maxSize: 27 })).toEqual(styled(''));
      expect(warn).toHaveBeenCalledWith('[RtfCodec] Ignoring RTF of 28 characters, over the 27 character limit');

      expect(rtfToStyled(rtf, { maxSize: 28 })).toEqual(styled('A'.repeat(20)));
    });

    it('should limit RTF to 10 MiB by default', () => {
      expect(MAX_RTF_SIZE).toBe(10485760);
    });
  });

  describe('Round-trip conversion', () => {
    it('should preserve styled text', () => {
      const value = build(
        ['Title', BOLD_UNDERLINE],
        '\n\n',
        'Body with {braces}, a \\ and ',
        ['émoji \u{1F600}', BOLD],
        '\n',
        ['under', UNDERLINE],
        ' 42'
      );

      expect(rtfToStyled(styledToRtf(value))).toEqual(value);
    });
  });
});
