import { describe, it, expect } from 'vitest';
import { baseCodeFromSku, mpCode, productKeyFor, urlSlug } from './product-key';

const NO_IDS = { url: '', productId: null, baseProductCode: null, sku: null, ean: null };

describe('urlSlug', () => {
  it('takes the last path segment', () => {
    expect(urlSlug('https://x.test/a/b/?q=1')).toBe('b');
    expect(urlSlug('https://x.test/whey/5854R.html#top')).toBe('5854R.html');
  });
});

describe('mpCode', () => {
  it('reads the base code before the -mp suffix', () => {
    expect(mpCode('https://www.bjornborg.com/fi/socks-10004564-mp001/')).toBe('10004564');
    expect(mpCode('https://www.bjornborg.com/fi/socks/')).toBeNull();
  });
});

describe('baseCodeFromSku', () => {
  it('reads the digits before the underscore', () => {
    expect(baseCodeFromSku('10004564_MP001')).toBe('10004564');
    expect(baseCodeFromSku('MG-1')).toBeNull();
    expect(baseCodeFromSku(null)).toBeNull();
  });
});

describe('productKeyFor', () => {
  const socks = { site: 'bjornborg', url: 'https://www.bjornborg.com/fi/socks-10004564-mp001/' };

  it('prefers the base code, then the id, then the sku for Björn Borg', () => {
    expect(productKeyFor(socks, { ...NO_IDS, baseProductCode: '10004564', productId: 'p1' })).toBe('base_10004564');
    expect(productKeyFor({ ...socks, baseProductCode: '10004564' }, NO_IDS)).toBe('base_10004564');
    expect(productKeyFor(socks, { ...NO_IDS, productId: 'p1', sku: 'S1' })).toBe('id_p1');
    expect(productKeyFor(socks, { ...NO_IDS, sku: 'S1' })).toBe('sku_S1');
    expect(productKeyFor(socks, NO_IDS)).toBe('url_socks-10004564-mp001');
  });

  it('lets page values win over configured ones', () => {
    expect(productKeyFor({ ...socks, baseProductCode: '2' }, { ...NO_IDS, baseProductCode: '1' })).toBe('base_1');
  });

  it('keys Fitnesstukku products by id or slug', () => {
    const whey = { site: 'fitnesstukku', url: 'https://www.fitnesstukku.fi/whey/5854R.html' };
    expect(productKeyFor(whey, { ...NO_IDS, productId: 'fitnesstukku_5854R' })).toBe('id_fitnesstukku_5854R');
    expect(productKeyFor(whey, NO_IDS)).toBe('url_fitnesstukku_5854R');
  });

  it('keys EAN stores by store and EAN', () => {
    const soap = { site: 'tokmanni', url: 'https://www.tokmanni.fi/soap-6415712345678' };
    expect(productKeyFor(soap, { ...NO_IDS, ean: '6415712345678', sku: 'T-1' })).toBe('tokmanni_6415712345678');
    expect(productKeyFor(soap, { ...NO_IDS, sku: 'T-1' })).toBe('tokmanni_T-1');
    expect(productKeyFor(soap, NO_IDS)).toBe('tokmanni_unknown');
    expect(productKeyFor({ site: 'apteekki360', url: 'https://apteekki360.fi/p' }, { ...NO_IDS, ean: '1' })).toBe('apteekki360_1');
  });

  it('falls back to the full URL for unknown sites', () => {
    const ref = { site: 'example', url: 'https://shop.example.test/p/1' };
    expect(productKeyFor(ref, NO_IDS)).toBe('url_https://shop.example.test/p/1');
    expect(productKeyFor(ref, { ...NO_IDS, productId: 'p1' })).toBe('id_p1');
  });
});
