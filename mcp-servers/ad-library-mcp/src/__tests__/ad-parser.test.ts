import { extractSnapshotUrls, parseAds, parseUrlUtmParams } from '../clients/ad-parser.js';

const NOW = new Date('2026-06-01T00:00:00.000Z');
const FUTURE = Date.UTC(2026, 11, 31) / 1000;
const PAST = Date.UTC(2026, 0, 1) / 1000;

describe('parseUrlUtmParams', () => {
  it('extracts tracking parameters and the base url', () => {
    const parsed = parseUrlUtmParams(
      'https://Shop.Example.com/sale?utm_source=facebook&utm_campaign=spring&ref=a&ref=b&fbclid=xyz'
    );

    expect(parsed).toEqual({
      fullUrl: 'https://Shop.Example.com/sale?utm_source=facebook&utm_campaign=spring&ref=a&ref=b&fbclid=xyz',
      baseUrl: 'https://shop.example.com/sale',
      domain: 'shop.example.com',
      utmParams: { utm_source: 'facebook', utm_campaign: 'spring', fbclid: 'xyz' },
      allParams: { utm_source: 'facebook', utm_campaign: 'spring', ref: ['a', 'b'], fbclid: 'xyz' },
      isInternal: false,
      hasUtm: true,
    });
  });

  it('flags platform domains and their subdomains as internal', () => {
    expect(parseUrlUtmParams('https://l.facebook.com/l.php?u=x').isInternal).toBe(true);
    expect(parseUrlUtmParams('https://wa.me/15550100').isInternal).toBe(true);
    expect(parseUrlUtmParams('https://notfacebook.com/').isInternal).toBe(false);
  });

  it('keeps unparseable urls with an error', () => {
    const parsed = parseUrlUtmParams('not a url?x=1');
    expect(parsed.baseUrl).toBe('not a url');
    expect(parsed.domain).toBeNull();
    expect(parsed.hasUtm).toBe(false);
    expect(parsed.parseError).toBeDefined();
  });
});

describe('extractSnapshotUrls', () => {
  it('collects link fields, call to action links, outbound links and body urls once each', () => {
    const urls = extractSnapshotUrls({
      link_url: 'https://shop.example.com/a',
      call_to_action: { link: { cta_url: 'https://shop.example.com/b' } },
      outbound_links: ['https://shop.example.com/a', { website_url: ' https://other.example.com/ ' }],
      body: { text: 'Visit https://blog.example.com/post, today.' },
    });

    expect(urls).toEqual([
      'https://shop.example.com/a',
      'https://shop.example.com/b',
      'https://other.example.com/',
      'https://blog.example.com/post',
    ]);
  });
});

describe('parseAds', () => {
  const imageAd = {
    ad_archive_id: 1001,
    page_id: 42,
    page_name: 'Acme',
    start_date: PAST,
    end_date: FUTURE,
    snapshot: {
      display_format: 'IMAGE',
      body: { text: 'Big sale' },
      title: 'Acme Shoes',
      link_url: 'https://shop.example.com/?utm_source=fb',
      images: [{ resized_image_url: 'https://cdn.example.com/1.jpg' }],
    },
  };

  it('builds one record for an image ad', () => {
    const [record] = parseAds([imageAd], { filterInactive: true, now: NOW });

    expect(record).toMatchObject({
      adId: '1001',
      pageId: '42',
      pageName: 'Acme',
      startDate: '2026-01-01T00:00:00.000Z',
      endDate: '2026-12-31T00:00:00.000Z',
      mediaUrl: 'https://cdn.example.com/1.jpg',
      mediaType: 'IMAGE',
      body: 'Big sale',
      title: 'Acme Shoes',
      hasExternalLinks: true,
      utmParams: { utm_source: 'fb' },
      domains: ['shop.example.com'],
    });
    expect(record.internalUrls).toEqual([]);
  });

  it('skips ended ads only when filtering inactive ads', () => {
    const ended = { ...imageAd, end_date: PAST };
    expect(parseAds([ended], { filterInactive: true, now: NOW })).toEqual([]);
    expect(parseAds([ended], { filterInactive: false, now: NOW })).toHaveLength(1);
  });

  it('uses the first video url for video ads', () => {
    const [record] = parseAds(
      [
        {
          ad_archive_id: '2002',
          snapshot: {
            display_format: 'VIDEO',
            videos: [{ video_sd_url: 'https://cdn.example.com/v1.mp4' }, { video_sd_url: 'https://cdn.example.com/v2.mp4' }],
          },
        },
      ],
      { filterInactive: true, now: NOW }
    );

    expect(record.mediaUrl).toBe('https://cdn.example.com/v1.mp4');
    expect(record.mediaType).toBe('VIDEO');
    expect(record.body).toBe('');
    expect(record.hasExternalLinks).toBe(false);
  });

  it('pairs each dynamic creative card with its own copy', () => {
    const records = parseAds(
      [
        {
          ad_archive_id: '3003',
          snapshot: {
            display_format: 'DCO',
            body: 'Shared body',
            title: 'Shared title',
            cards: [
              { resized_image_url: 'https://cdn.example.com/c1.jpg', body: 'Card one', title: 'First' },
              { original_image_url: 'https://cdn.example.com/c2.jpg' },
              { body: 'No media' },
            ],
          },
        },
      ],
      { filterInactive: true, now: NOW }
    );

    expect(records.map((record) => [record.mediaUrl, record.body, record.title])).toEqual([
      ['https://cdn.example.com/c1.jpg', 'Card one', 'First'],
      ['https://cdn.example.com/c2.jpg', 'Shared body', 'Shared title'],
    ]);
  });

  it('skips ads without an id, media or a supported format', () => {
    const records = parseAds(
      [
        { snapshot: { display_format: 'IMAGE', images: [{ resized_image_url: 'https://cdn.example.com/x.jpg' }] } },
        { ad_archive_id: '1', snapshot: { display_format: 'CAROUSEL', images: [] } },
        { ad_archive_id: '2', snapshot: { display_format: 'IMAGE', images: [] } },
        { ad_archive_id: '3', snapshot: 'broken' },
        'not an ad',
      ],
      { filterInactive: true, now: NOW }
    );

    expect(records).toEqual([]);
  });
});
