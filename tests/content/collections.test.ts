import { describe, expect, it } from 'vitest';
import { buildTagIndex, PageCollection, sortPages } from '../../src/content/collections.js';
import { fakePage } from '../helpers/page.js';

const bPost = fakePage('2024-01-01-b-post.md');
const second = fakePage('2024-01-01-2-alpha.md');
const tenth = fakePage('2024-01-01-10-zeta.md');
const later = fakePage('2024-02-01-later.md');
const aPost = fakePage('2024-01-01-a-post.md');
const all = [bPost, second, tenth, later, aPost];

describe('sortPages', () => {
  it('sorts ascending by date, then unnumbered first, then number and name', () => {
    expect(sortPages(all, false)).toEqual([aPost, bPost, second, tenth, later]);
  });

  it('sorts descending by date, then numbered first, then number and name', () => {
    expect(sortPages(all, true)).toEqual([later, tenth, second, bPost, aPost]);
  });

  it('does not depend on input order', () => {
    expect(sortPages([...all].reverse(), true)).toEqual(sortPages(all, true));
    expect(sortPages([...all].reverse(), false)).toEqual(sortPages(all, false));
  });

  it('keeps pages with equal keys in input order', () => {
    const x = fakePage('2024-01-01-same.md', { folder: 'x', path: '/project/site/x/2024-01-01-same.md' });
    const y = fakePage('2024-01-01-same.md', { folder: 'y', path: '/project/site/y/2024-01-01-same.md' });
    expect(sortPages([x, y], true)).toEqual([x, y]);
    expect(sortPages([y, x], false)).toEqual([y, x]);
  });
});

describe('PageCollection', () => {
  const post = fakePage('2024-03-01-post.md', { group: 'posts', tags: ['news'] });
  const draft = fakePage('_idea.md', { group: 'posts', draft: true });
  const about = fakePage('about.md', { tags: ['info', 'news'] });
  const pages = new PageCollection([post, draft, about]);

  it('behaves like an ordered list', () => {
    expect(pages.length).toBe(3);
    expect(pages.at(0)).toBe(post);
    expect(pages.at(-1)).toBe(about);
    expect([...pages]).toEqual([post, draft, about]);
    expect(pages.toArray()).toEqual([post, draft, about]);
  });

  it('filters by group, tag and draft state', () => {
    expect(pages.group('posts').toArray()).toEqual([post, draft]);
    expect(pages.withTag('news').toArray()).toEqual([post, about]);
    expect(pages.drafts().toArray()).toEqual([draft]);
    expect(pages.published().toArray()).toEqual([post, about]);
  });

  it('lists the newest pages', () => {
    const collection = new PageCollection(all);
    expect(collection.sorted().toArray()).toEqual([later, tenth, second, bPost, aPost]);
    expect(collection.sorted(false).toArray()).toEqual([aPost, bPost, second, tenth, later]);
    expect(collection.latest(2).toArray()).toEqual([later, tenth]);
    expect(collection.latest().length).toBe(5);
    expect(collection.sorted().sorted().toArray()).toEqual(collection.sorted().toArray());
  });
});

describe('buildTagIndex', () => {
  it('groups pages by tag in first-seen order', () => {
    const one = fakePage('one.md', { tags: ['a', 'b'] });
    const two = fakePage('two.md', { tags: ['b'] });
    const tags = buildTagIndex([one, two]);

    expect(tags.keys()).toEqual(['a', 'b']);
    expect(tags.size).toBe(2);
    expect(tags.get('b')?.toArray()).toEqual([one, two]);
    expect(tags.has('c')).toBe(false);
    expect(tags.get('c')).toBeUndefined();
    expect([...tags].map(([tag, list]) => [tag, list.length])).toEqual([
      ['a', 1],
      ['b', 2]
    ]);
  });
});
