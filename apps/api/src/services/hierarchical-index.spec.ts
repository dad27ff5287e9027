import { PickerNode } from '@trendlens/shared-types';
import { HierarchicalIndex, flattenTree } from './hierarchical-index';

const geoTree: PickerNode = {
  name: 'Worldwide',
  id: '',
  children: [
    { name: 'Georgia', id: 'GE' },
    {
      name: 'United States',
      id: 'US',
      children: [
        { name: 'New York', id: 'NY', children: [{ name: 'New York NY', id: '501' }] },
        { name: 'Georgia', id: 'GA' },
        { name: 'New Mexico', id: 'NM' },
      ],
    },
  ],
};

const categoryTree: PickerNode = {
  name: 'All categories',
  id: '0',
  children: [
    { name: 'Sports', id: '20', children: [{ name: 'Soccer', id: '294' }] },
    { name: 'Arts & Entertainment', id: '3' },
  ],
};

describe('flattenTree', () => {
  it('joins geo ids to their parent', () => {
    expect(flattenTree(geoTree, true).map((item) => item.id)).toEqual([
      '',
      'GE',
      'US',
      'US-NY',
      'US-NY-501',
      'US-GA',
      'US-NM',
    ]);
  });

  it('keeps category ids as they are', () => {
    expect(flattenTree(categoryTree, false).map((item) => item.id)).toEqual([
      '0',
      '20',
      '294',
      '3',
    ]);
  });
});

describe('HierarchicalIndex', () => {
  const geo = HierarchicalIndex.fromTree(geoTree, true);
  const categories = HierarchicalIndex.fromTree(categoryTree, false);

  it('finds the first entry with an exact name', () => {
    expect(geo.exactSearch('georgia')).toEqual({ name: 'Georgia', id: 'GE' });
    expect(geo.exactSearch(' New York ')).toEqual({ name: 'New York', id: 'US-NY' });
    expect(geo.exactSearch('York')).toBeUndefined();
  });

  it('ranks partial matches by similarity', () => {
    expect(geo.partialSearch('new york').map((item) => item.id)).toEqual([
      'US-NY',
      'US-NY-501',
    ]);
    expect(geo.partialSearch('NEW').map((item) => item.name)).toEqual([
      'New York',
      'New Mexico',
      'New York NY',
    ]);
  });

  it('matches on words inside names', () => {
    expect(categories.find('entertain')).toEqual([{ name: 'Arts & Entertainment', id: '3' }]);
  });

  it('lists everything for a blank query', () => {
    expect(categories.find('  ')).toHaveLength(4);
    expect(categories.size).toBe(4);
  });

  it('searches geo ids by substring', () => {
    expect(geo.idSearch('us-ny').map((item) => item.id)).toEqual(['US-NY', 'US-NY-501']);
  });

  it('searches category ids exactly', () => {
    expect(categories.idSearch('20')).toEqual([{ name: 'Sports', id: '20' }]);
    expect(categories.idSearch('2')).toEqual([]);
  });
});
