import { escapeHtml, renderChatPage } from '../../routes/home';

describe('Chat page rendering', () => {
  it('should fill placeholders with the wiki name and page count', () => {
    const html = renderChatPage('<h1>{{wikiName}}</h1><p>{{pageCount}} pages</p>', { wikiName: 'Test Wiki', pageCount: 3 });

    expect(html).toBe('<h1>Test Wiki</h1><p>3 pages</p>');
  });

  it('should escape markup in the wiki name', () => {
    const html = renderChatPage('<h1>{{wikiName}}</h1>', { wikiName: '<b>"A&B"</b>', pageCount: 0 });

    expect(html).toBe('<h1>&lt;b&gt;&quot;A&amp;B&quot;&lt;/b&gt;</h1>');
  });

  it('should leave unknown placeholders as they are', () => {
    expect(renderChatPage('{{other}}', { wikiName: 'W', pageCount: 0 })).toBe('{{other}}');
  });

  it('should escape single quotes', () => {
    expect(escapeHtml("it's")).toBe('it&#39;s');
  });
});
