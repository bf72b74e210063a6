import { describe, it, expect } from 'vitest';
import { decodeEntities, extractImages, htmlToText } from './html.js';

describe('htmlToText', () => {
  it('should keep block structure as lines', () => {
    const html = `<html><head><style>p { color: red; }</style></head>
<body><h1>Title</h1><div><p>First &amp; second</p><p>Line<br/>break</p>
<script>alert('x')</script><ul><li>one</li><li>two</li></ul></div></body></html>`;

    expect(htmlToText(html)).toBe('Title\nFirst & second\nLine\nbreak\none\ntwo');
  });

  it('should drop blank lines and surrounding whitespace', () => {
    expect(htmlToText('<p>  a  </p>\n\n<p>&nbsp;</p><p>b</p>')).toBe('a\nb');
  });
});

describe('decodeEntities', () => {
  it('should decode named and numeric references once', () => {
    expect(decodeEntities('&lt;tag&gt; &quot;q&quot; &#39;s&#x27; &amp;lt;')).toBe(
      `<tag> "q" 's' &lt;`,
    );
    expect(decodeEntities('&unknown; &#x110000;')).toBe('&unknown; &#x110000;');
  });
});

describe('extractImages', () => {
  it('should prefer full resolution sources in document order', () => {
    const html = `<p>x</p>
<img src="https://api.example.test/r/1/$value" data-src-type="image/png" data-fullres-src="https://api.example.test/r/1full/$value" data-fullres-src-type="image/jpeg" />
<img alt="no source">
<img src='https://api.example.test/r/2/$value?a=1&amp;b=2'>`;

    expect(extractImages(html)).toEqual([
      {
        src: 'https://api.example.test/r/1full/$value',
        contentType: 'image/jpeg',
      },
      {
        src: 'https://api.example.test/r/2/$value?a=1&b=2',
        contentType: undefined,
      },
    ]);
  });
});
