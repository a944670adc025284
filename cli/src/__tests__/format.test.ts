/**
 * Tests for the CLI's query building and table layout
 */

import { buildQuery } from '../api.js';
import { describeToolCall, renderTable } from '../format.js';

describe('buildQuery', () => {
  it('leaves out unset and empty filters', () => {
    expect(buildQuery({ status: 'open', priority: undefined })).toBe('?status=open');
    expect(buildQuery({ zip: '10001', weight: 2.5, serviceLevel: '' })).toBe('?zip=10001&weight=2.5');
  });

  it('returns an empty string when nothing is set', () => {
    expect(buildQuery({})).toBe('');
    expect(buildQuery({ category: undefined })).toBe('');
  });

  it('encodes values', () => {
    expect(buildQuery({ search: 'water bottle' })).toBe('?search=water+bottle');
  });
});

describe('renderTable', () => {
  it('aligns columns to the widest cell', () => {
    const lines = renderTable([
      { ID: 1, Name: 'Trail Backpack', Price: '$89.50' },
      { ID: 12, Name: 'Bottle', Price: '$4.00' },
    ]);

    expect(lines).toEqual([
      'ID  Name            Price',
      '─'.repeat(26),
      '1   Trail Backpack  $89.50',
      '12  Bottle          $4.00',
    ]);
  });

  it('follows the given column order and blanks missing values', () => {
    const lines = renderTable([{ Name: 'Stove', Category: null, ID: 3 }], ['ID', 'Category']);

    expect(lines).toEqual(['ID  Category', '─'.repeat(12), '3']);
  });

  it('ignores colour codes when measuring cells', () => {
    const red = '\u001b[31m0\u001b[39m';
    const lines = renderTable([{ Stock: red, Name: 'Stove' }]);

    expect(lines[2]).toBe(`${red}      Stove`);
  });

  it('returns no lines for no rows', () => {
    expect(renderTable([])).toEqual([]);
  });
});

describe('describeToolCall', () => {
  it('shows the message of a successful call', () => {
    expect(describeToolCall({
      tool: 'check_inventory',
      arguments: { productId: 2 },
      result: { success: true, message: 'Insulated Bottle: 3 in stock' },
    })).toBe('check_inventory({"productId":2}) -> Insulated Bottle: 3 in stock');
  });

  it('shows the error of a failed call', () => {
    expect(describeToolCall({
      tool: 'cancel_order',
      arguments: { orderId: 9 },
      result: { success: false, error: 'Order #9 not found' },
    })).toBe('cancel_order({"orderId":9}) -> failed: Order #9 not found');
  });
});
