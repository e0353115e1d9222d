/**
 * Look up an account and its latest statuses on its home instance.
 * Usage: npx tsx scripts/lookup-account.ts user@host
 */

import { InstanceSwitcher } from '../src/index.js';

async function main() {
    const acct = process.argv[2];
    if (!acct) {
        console.error('❌ Usage: npx tsx scripts/lookup-account.ts user@host');
        process.exit(1);
    }

    const switcher = new InstanceSwitcher();
    try {
        const account = await switcher.accountLookup(acct);
        console.log('✅ Account found');
        console.log('ID:', account.id);
        console.log('Name:', account.display_name || account.username);
        console.log('Followers:', account.followers_count);

        const statuses = await switcher.accountStatuses(acct, { limit: 3, exclude_reblogs: true });
        for (const status of statuses.items) {
            console.log(`- [${status.created_at}] ${status.url ?? status.uri}`);
        }
    } finally {
        switcher.close();
    }
}

main().catch((error) => {
    console.error('❌ Lookup failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
