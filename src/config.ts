const WEI = 10n ** 18n;

const config = {
    chainId: 'stakeledger-devnet',
    tokenName: 'Stakeledger',
    tokenSymbol: 'STKL',
    decimals: 18,
    // Custodial account that represents the token contract itself
    tokenAccount: 'stakeledger-token',
    nullAccount: 'null',
    hardCap: 20_000_000n * WEI,
    // When true, burn and burnFrom also require the burner role
    burnRequiresRole: false,
    maxValue: (1n << 256n) - 1n,
    eventLogMax: 10000,
    // signed transactions are accepted this many seconds either side of the ledger clock
    txExpirationSeconds: 3600,
    staking: {
        poolAccount: process.env.POOL_ACCOUNT || 'stakeledger-pool',
        avgSecondsPerMonth: 2_630_016,
        poolLifetimeMonths: 60,
        maxOpenDelaySeconds: 13 * 7 * 24 * 60 * 60,
        minStakeAmount: 1_000n * WEI,
        maxStakeAmountUser: 200_000n * WEI,
        maxStakeAmountPool: 10_000_000n * WEI,
    },
};

export type Config = typeof config;

export default config;
