import { toProductResponse } from '../dto/product-response.dto';
import { imageRow, productRow } from '../../../test/support/product-rows';
import { RowMappingError, toProduct, toProductUpdateRow } from './product-row.mapper';

describe('toProduct', () => {
  it('parses numeric strings and defaults missing arrays', () => {
    const product = toProduct(productRow({ compare_at_price: '120.5' }));

    expect(product.price).toEqual({ amount: 99.99, currency: 'USD' });
    expect(product.compareAtPrice).toBe(120.5);
    expect(product.tags).toEqual([]);
    expect(product.attributes).toEqual([]);
    expect(product.categories).toEqual([]);
    expect(product.brand).toBeNull();
  });

  it('rejects a price that is not numeric', () => {
    expect(() => toProduct(productRow({ price_amount: 'abc' }))).toThrow(
      new RowMappingError('price_amount is not numeric: abc'),
    );
  });

  it('rejects an unknown status', () => {
    expect(() => toProduct(productRow({ status: 'archived' }))).toThrow(
      new RowMappingError('Unknown product status "archived"'),
    );
  });

  it('orders images by display order, then insertion time, then id', () => {
    const product = toProduct(productRow({
      images: [
        imageRow('c', 1),
        imageRow('b', 0, null, '2025-01-02T00:00:00.000Z'),
        imageRow('a', 0, null, '2025-01-02T00:00:00.000Z'),
        imageRow('d', 0),
      ],
    }));

    expect(product.images.map((image) => image.id)).toEqual(['d', 'a', 'b', 'c']);
  });

  it('keeps variant images off the product', () => {
    const product = toProduct(productRow({
      images: [imageRow('own', 0), imageRow('shared', 1, 'v-1')],
      variants: [{
        id: 'v-1',
        product_id: 'p-1',
        name: 'Large',
        sku: 'TEST-123-L',
        price_amount: '109.99',
        price_currency: 'USD',
        compare_at_price: null,
        stock: 2,
        is_available: true,
        is_selected: false,
        attributes: { size: 'L' },
        images: [imageRow('shared', 1, 'v-1')],
      }],
    }));

    expect(product.images.map((image) => image.id)).toEqual(['own']);
    expect(product.variants[0].images.map((image) => image.id)).toEqual(['shared']);
    expect(product.variants[0].price.amount).toBe(109.99);
    expect(product.variants[0].attributes).toEqual({ size: 'L' });
  });

  it('reads snake_case attribute json', () => {
    const product = toProduct(productRow({
      attributes: [
        { id: 'attr-1', name: 'Weight', value: 2, display_value: '2 kg', is_highlighted: true, group_name: 'Specs' },
        { name: 'Color', value: 'Red' },
      ],
    }));

    expect(product.attributes).toEqual([
      { id: 'attr-1', name: 'Weight', value: 2, displayValue: '2 kg', isHighlighted: true, groupName: 'Specs' },
      { id: null, name: 'Color', value: 'Red', displayValue: 'Red', isHighlighted: false, groupName: null },
    ]);
  });

  it('maps brand and category embeds', () => {
    const product = toProduct(productRow({
      brand: { id: 'b-1', name: 'Acme', logo: null },
      categories: [{ id: 'c-1', name: 'Phones', slug: 'phones', parent_id: null }],
    }));

    expect(product.brand).toEqual({ id: 'b-1', name: 'Acme', logo: null });
    expect(product.categories).toEqual([{ id: 'c-1', name: 'Phones', slug: 'phones', parentId: null }]);
  });
});

describe('toProductUpdateRow', () => {
  it('carries only the keys that are present', () => {
    expect(toProductUpdateRow({ stock: 3, compareAtPrice: null })).toEqual({ stock: 3, compare_at_price: null });
  });

  it('writes price as amount and currency columns', () => {
    expect(toProductUpdateRow({ price: { amount: 5, currency: 'EUR' } })).toEqual({
      price_amount: 5,
      price_currency: 'EUR',
    });
  });
});

describe('toProductResponse', () => {
  it('fills attribute ids that stored rows lack', () => {
    const response = toProductResponse(toProduct(productRow({ attributes: [{ name: 'Color', value: 'Red' }] })));

    expect(response.attributes[0].id).toMatch(/^attr-0-[0-9a-f]{8}$/);
  });

  it('flattens money into price and currency', () => {
    const response = toProductResponse(toProduct(productRow()));

    expect([response.price, response.currency]).toEqual([99.99, 'USD']);
  });
});
