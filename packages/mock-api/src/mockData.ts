export interface MockAccount {
  id: string;
  name: string;
  currency: string;
  time_zone_id: string;
  business_id: string;
  attribution_type: string;
  click_attribution_window: string;
  view_attribution_window: string;
  created_at: string;
  modified_at: string;
}

export interface MockCampaign {
  id: string;
  account_id: string;
  name: string;
  objective: string;
  configured_status: string;
  effective_status: string;
  funding_instrument_id: string;
  spend_cap: number;
  is_processing: boolean;
}

export interface MockAdGroup {
  id: string;
  account_id: string;
  campaign_id: string;
  name: string;
  bid_strategy: string;
  bid_value: number;
  goal_type: string;
  goal_value: number;
  configured_status: string;
  effective_status: string;
  start_time: string;
  end_time: string | null;
  expand_targeting: boolean;
  is_processing: boolean;
  targeting: {
    communities: string[];
    devices: string[];
    geolocations: string[];
  };
}

export interface MockAd {
  id: string;
  account_id: string;
  campaign_id: string;
  ad_group_id: string;
  name: string;
  click_url: string;
  post_id: string;
  configured_status: string;
  effective_status: string;
  is_processing: boolean;
}

export interface MockReportRow {
  date: string;
  account_id: string;
  campaign_id: string;
  ad_group_id: string;
  ad_id: string;
  impressions: number;
  clicks: number;
  spend: number;
  ctr: number;
  cpc: number;
  ecpm: number;
}

export interface MockDataset {
  account: MockAccount;
  campaigns: MockCampaign[];
  adGroups: MockAdGroup[];
  ads: MockAd[];
}

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function pad(index: number): string {
  return index.toString().padStart(3, "0");
}

// FNV-1a, enough to spread metrics deterministically
function hashSeed(value: string): number {
  let hash = 0x811c9dc5;

  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }

  return hash;
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }

  return !Number.isNaN(Date.parse(`${value}T00:00:00.000Z`));
}

export function buildMockDataset(accountId: string, campaignCount: number): MockDataset {
  const campaigns: MockCampaign[] = [];
  const adGroups: MockAdGroup[] = [];
  const ads: MockAd[] = [];

  for (let index = 0; index < campaignCount; index += 1) {
    const campaignId = `cmp-${pad(index)}`;
    const adGroupId = `adg-${pad(index)}`;
    const status = index % 3 === 2 ? "PAUSED" : "ACTIVE";

    campaigns.push({
      id: campaignId,
      account_id: accountId,
      name: `Campaign ${index + 1}`,
      objective: index % 2 === 0 ? "CLICKS" : "IMPRESSIONS",
      configured_status: status,
      effective_status: status,
      funding_instrument_id: "fi-001",
      spend_cap: 50_000_000,
      is_processing: false
    });

    adGroups.push({
      id: adGroupId,
      account_id: accountId,
      campaign_id: campaignId,
      name: `Ad group ${index + 1}`,
      bid_strategy: "CPC",
      bid_value: 750_000,
      goal_type: "DAILY_SPEND",
      goal_value: 10_000_000,
      configured_status: status,
      effective_status: status,
      start_time: "2024-01-01T00:00:00.000Z",
      end_time: null,
      expand_targeting: index % 2 === 1,
      is_processing: false,
      targeting: {
        communities: ["typescript", "node"],
        devices: ["DESKTOP", "MOBILE"],
        geolocations: ["US"]
      }
    });

    for (let adIndex = 0; adIndex < 2; adIndex += 1) {
      ads.push({
        id: `ad-${pad(index)}-${adIndex}`,
        account_id: accountId,
        campaign_id: campaignId,
        ad_group_id: adGroupId,
        name: `Ad ${index + 1}.${adIndex + 1}`,
        click_url: `https://example.com/landing/${index}/${adIndex}`,
        post_id: `t3_post${pad(index)}${adIndex}`,
        configured_status: status,
        effective_status: status,
        is_processing: false
      });
    }
  }

  return {
    account: {
      id: accountId,
      name: "Mock ads account",
      currency: "USD",
      time_zone_id: "UTC",
      business_id: "biz-001",
      attribution_type: "CLICK_THROUGH",
      click_attribution_window: "DAY_28",
      view_attribution_window: "DAY_1",
      created_at: "2023-06-01T00:00:00.000Z",
      modified_at: "2024-01-01T00:00:00.000Z"
    },
    campaigns,
    adGroups,
    ads
  };
}

/** Days whose day-of-month is a multiple of 7 have no delivery. */
export function buildReportRows(dataset: MockDataset, date: string): MockReportRow[] {
  const dayOfMonth = Number.parseInt(date.slice(8, 10), 10);
  if (dayOfMonth % 7 === 0) {
    return [];
  }

  return dataset.ads.map((ad) => {
    const seed = hashSeed(`${date}:${ad.id}`);
    const impressions = 100 + (seed % 900);
    const clicks = seed % 50;
    const spend = clicks * 250_000;

    return {
      date,
      account_id: dataset.account.id,
      campaign_id: ad.campaign_id,
      ad_group_id: ad.ad_group_id,
      ad_id: ad.id,
      impressions,
      clicks,
      spend,
      ctr: clicks / impressions,
      cpc: clicks === 0 ? 0 : spend / clicks / 1_000_000,
      ecpm: (spend / 1_000_000 / impressions) * 1000
    };
  });
}

export function buildReportRowsForRange(
  dataset: MockDataset,
  startsAt: string,
  endsAt: string
): MockReportRow[] {
  const rows: MockReportRow[] = [];
  const endMs = Date.parse(`${endsAt}T00:00:00.000Z`);

  for (
    let dayMs = Date.parse(`${startsAt}T00:00:00.000Z`);
    dayMs <= endMs;
    dayMs += DAY_MS
  ) {
    rows.push(...buildReportRows(dataset, new Date(dayMs).toISOString().slice(0, 10)));
  }

  return rows;
}
