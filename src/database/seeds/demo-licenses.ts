import { NewLicense } from '../stores/license-store.interface';

const DAY_MS = 24 * 60 * 60 * 1000;

interface DemoLicenseSeed {
  license_key: string;
  customer_name: string;
  max_activations: number;
  validity_days: number;
}

export const DEMO_LICENSE_SEEDS: readonly DemoLicenseSeed[] = [
  {
    license_key: 'LAS-DEMO01-STND-TEST-0000-0001',
    customer_name: 'Demo User 1',
    max_activations: 1,
    validity_days: 365,
  },
  {
    license_key: 'LAS-DEMO02-STND-TEST-0000-0002',
    customer_name: 'Demo User 2',
    max_activations: 1,
    validity_days: 365,
  },
];

export function buildDemoLicenses(now: Date): NewLicense[] {
  return DEMO_LICENSE_SEEDS.map((seed) => ({
    license_key: seed.license_key,
    customer_name: seed.customer_name,
    customer_email: null,
    max_activations: seed.max_activations,
    creation_date: now,
    expiration_date: new Date(now.getTime() + seed.validity_days * DAY_MS),
    is_active: true,
  }));
}
