import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { EvmVerifier } from '../../src/services/verifiers/evm.js';
import { EvmLedgerClient, EvmLog, EvmTransaction } from '../../src/domain/network.js';
import { PaymentRequest } from '../../src/domain/types.js';
import { describeChain } from '../../src/domain/chain.js';

const payer = '0x' + 'aa'.repeat(20);
const recipient = '0x' + 'bb'.repeat(20);
const token = '0x' + 'cc'.repeat(20);
const other = '0x' + 'dd'.repeat(20);
const hash1 = '0x' + '11'.repeat(32);
const hash2 = '0x' + '22'.repeat(32);

function log(transactionHash: string, overrides: Partial<EvmLog> = {}): EvmLog {
    return {
        address: recipient,
        transactionHash,
        blockNumber: 950n,
        logIndex: 0,
        topics: [],
        data: '0x',
        ...overrides,
    };
}

function tx(hash: string, from: string, value: bigint): EvmTransaction {
    return { hash, from, to: recipient, value };
}

describe('EvmVerifier', () => {
    let client: {
        getChainId: Mock<EvmLedgerClient['getChainId']>;
        getBlockNumber: Mock<EvmLedgerClient['getBlockNumber']>;
        getLogs: Mock<EvmLedgerClient['getLogs']>;
        getTransaction: Mock<EvmLedgerClient['getTransaction']>;
    };

    const request: PaymentRequest = {
        amount: '1000',
        currency: { kind: 'native' },
        recipient,
        chain: describeChain({ family: 'evm', network: 'ethereum' }),
        nonce: 'nonce-1',
    };

    beforeEach(() => {
        client = {
            getChainId: vi.fn<EvmLedgerClient['getChainId']>().mockResolvedValue(1),
            getBlockNumber: vi.fn<EvmLedgerClient['getBlockNumber']>().mockResolvedValue(1000n),
            getLogs: vi.fn<EvmLedgerClient['getLogs']>().mockResolvedValue([]),
            getTransaction: vi.fn<EvmLedgerClient['getTransaction']>().mockResolvedValue(null),
        };
    });

    const connect = () => EvmVerifier.connect(client, { family: 'evm', network: 'ethereum' });

    describe('connect', () => {
        it('accepts an endpoint serving the expected chain', async () => {
            const verifier = await connect();
            expect(verifier.supportsChain({ family: 'evm', network: 'polygon' })).toBe(true);
            expect(verifier.supportsChain({ family: 'solana', network: 'devnet' })).toBe(false);
        });

        it('rejects a chain id mismatch', async () => {
            client.getChainId.mockResolvedValue(137);
            await expect(connect()).rejects.toMatchObject({
                code: 'NETWORK_ERROR',
                message: 'Chain ID mismatch: expected 1, got 137',
            });
        });

        it('rejects when the chain id cannot be fetched', async () => {
            client.getChainId.mockRejectedValue(new Error('connection refused'));
            await expect(connect()).rejects.toMatchObject({
                code: 'NETWORK_ERROR',
                message: 'Failed to get chain ID: connection refused',
            });
        });

        it('rejects a non-numeric custom chain id', async () => {
            await expect(EvmVerifier.connect(client, { family: 'evm', network: { custom: 'fantom' } }))
                .rejects.toMatchObject({ code: 'PARSE_ERROR', message: 'Invalid custom chain ID: fantom' });
            expect(client.getChainId).not.toHaveBeenCalled();
        });

        it('accepts a numeric custom chain id', async () => {
            client.getChainId.mockResolvedValue(31337);
            await expect(EvmVerifier.connect(client, { family: 'evm', network: { custom: '31337' } }))
                .resolves.toBeInstanceOf(EvmVerifier);
        });

        it('refuses non-EVM chain types', async () => {
            await expect(EvmVerifier.connect(client, { family: 'sui', network: 'mainnet' }))
                .rejects.toMatchObject({ code: 'CHAIN_NOT_SUPPORTED' });
        });
    });

    describe('native transfers', () => {
        it('finds the payer transfer and keeps every candidate in the audit trail', async () => {
            client.getLogs.mockResolvedValue([log(hash1), log(hash1, { logIndex: 1 }), log(hash2, { blockNumber: 990n, logIndex: 3 })]);
            client.getTransaction.mockImplementation(async hash =>
                hash === hash1 ? tx(hash1, other, 5000n) : tx(hash2, payer.toUpperCase().replace('0X', '0x'), 1000n)
            );

            const verifier = await connect();
            const result = await verifier.verifyPayment(request, payer);

            expect(client.getLogs).toHaveBeenCalledWith({ address: recipient, fromBlock: 900n, toBlock: 1000n });
            expect(client.getTransaction).toHaveBeenCalledTimes(2);
            expect(result.isPaid).toBe(true);
            expect(result.paidAmount).toBe('1000');
            expect(result.transactionHash).toBe(hash2);
            expect(result.chain).toEqual(request.chain);
            expect(result.transactionLogs).toHaveLength(3);
            expect(result.transactionLogs[2]).toEqual({
                transactionHash: hash2,
                from: '0x' + 'AA'.repeat(20),
                to: recipient,
                value: '1000',
                blockNumber: 990,
                logIndex: 3,
            });
        });

        it('reports unpaid when no transfer covers the amount', async () => {
            client.getLogs.mockResolvedValue([log(hash1)]);
            client.getTransaction.mockResolvedValue(tx(hash1, payer, 999n));

            const result = await (await connect()).verifyPayment(request, payer);

            expect(result.isPaid).toBe(false);
            expect(result.paidAmount).toBe('0');
            expect(result.transactionHash).toBeUndefined();
            expect(result.transactionLogs).toHaveLength(1);
        });

        it('skips logs whose transaction cannot be fetched', async () => {
            client.getLogs.mockResolvedValue([log(hash1), log(hash2)]);
            client.getTransaction.mockImplementation(async hash => {
                if (hash === hash1) throw new Error('timeout');
                return tx(hash2, payer, 1000n);
            });

            const result = await (await connect()).verifyPayment(request, payer);

            expect(result.isPaid).toBe(true);
            expect(result.transactionLogs.map(l => l.transactionHash)).toEqual([hash2]);
        });

        it('floors the scan window at the genesis block', async () => {
            client.getBlockNumber.mockResolvedValue(50n);
            await (await connect()).verifyPayment(request, payer);
            expect(client.getLogs).toHaveBeenCalledWith({ address: recipient, fromBlock: 0n, toBlock: 50n });
        });

        it('honours a configured lookback', async () => {
            const verifier = await EvmVerifier.connect(client, { family: 'evm', network: 'ethereum' }, { lookbackBlocks: 10 });
            await verifier.verifyPayment(request, payer);
            expect(client.getLogs).toHaveBeenCalledWith({ address: recipient, fromBlock: 990n, toBlock: 1000n });
        });

        it('maps ledger failures to RPC errors', async () => {
            client.getLogs.mockRejectedValue(new Error('boom'));
            await expect((await connect()).verifyPayment(request, payer))
                .rejects.toMatchObject({ code: 'RPC_ERROR', message: 'Failed to get logs: boom' });

            client.getBlockNumber.mockRejectedValue(new Error('down'));
            await expect((await connect()).verifyPayment(request, payer))
                .rejects.toMatchObject({ code: 'RPC_ERROR', message: 'Failed to get block number: down' });
        });

        it('rejects malformed addresses and amounts before touching the ledger', async () => {
            const verifier = await connect();
            await expect(verifier.verifyPayment(request, 'not-an-address')).rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
            await expect(verifier.verifyPayment({ ...request, recipient: '0x1234' }, payer)).rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
            await expect(verifier.verifyPayment({ ...request, amount: '0.5' }, payer)).rejects.toMatchObject({ code: 'PARSE_ERROR' });
            expect(client.getBlockNumber).not.toHaveBeenCalled();
        });
    });

    describe('token transfers', () => {
        const tokenRequest: PaymentRequest = {
            ...request,
            amount: '1.5',
            currency: { kind: 'token', address: token, decimals: 6 },
        };
        const word = (value: bigint) => value.toString(16).padStart(64, '0');

        it('filters Transfer events by payer and recipient and decodes the amount', async () => {
            client.getLogs.mockResolvedValue([
                log(hash1, { address: token, data: '0x1234' }),
                log(hash2, { address: token, data: `0x${word(1500000n)}`, logIndex: 7 }),
            ]);

            const result = await (await connect()).verifyPayment(tokenRequest, payer);

            expect(client.getLogs).toHaveBeenCalledWith({
                address: token,
                fromBlock: 900n,
                toBlock: 1000n,
                transfer: { from: payer, to: recipient },
            });
            expect(result.isPaid).toBe(true);
            expect(result.paidAmount).toBe('1.5');
            expect(result.transactionHash).toBe(hash2);
            expect(result.transactionLogs).toEqual([
                {
                    transactionHash: hash2,
                    from: payer,
                    to: recipient,
                    value: '1500000',
                    blockNumber: 950,
                    logIndex: 7,
                    data: word(1500000n),
                },
            ]);
            expect(client.getTransaction).not.toHaveBeenCalled();
        });

        it('scales a whole-token amount by the token decimals', async () => {
            const oneToken: PaymentRequest = { ...tokenRequest, amount: '1' };
            const verifier = await connect();

            client.getLogs.mockResolvedValue([log(hash1, { address: token, data: `0x${word(1000000n)}` })]);
            expect((await verifier.verifyPayment(oneToken, payer)).isPaid).toBe(true);

            client.getLogs.mockResolvedValue([log(hash1, { address: token, data: `0x${word(999999n)}` })]);
            expect((await verifier.verifyPayment(oneToken, payer)).isPaid).toBe(false);
        });

        it('refuses an amount finer than the token decimals before scanning', async () => {
            client.getLogs.mockResolvedValue([log(hash1, { address: token, data: `0x${word(0n)}` })]);
            const verifier = await connect();

            for (const amount of ['0.0000004', '1.0000004']) {
                await expect(verifier.verifyPayment({ ...tokenRequest, amount }, payer)).rejects.toMatchObject({
                    code: 'PARSE_ERROR',
                    message: `Parse Error: amount "${amount}" has more than 6 fraction digits`,
                });
            }
            expect(client.getLogs).not.toHaveBeenCalled();
        });

        it('reports unpaid for a transfer below the scaled amount', async () => {
            client.getLogs.mockResolvedValue([log(hash1, { address: token, data: `0x${word(1499999n)}` })]);

            const result = await (await connect()).verifyPayment(tokenRequest, payer);

            expect(result.isPaid).toBe(false);
            expect(result.transactionLogs[0].value).toBe('1499999');
        });
    });
});
