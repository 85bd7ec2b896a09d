import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { PublicKey, SystemProgram, type ConfirmedSignatureInfo, type ParsedTransactionWithMeta } from '@solana/web3.js';
import { SolanaVerifier } from '../../src/services/verifiers/solana.js';
import { MAX_SCAN_PAGES } from '../../src/services/verifiers/verifier.js';
import { Page, SolanaLedgerClient, SolanaSignature, SolanaTransactionDetail } from '../../src/domain/network.js';
import { PaymentRequest } from '../../src/domain/types.js';
import { describeChain } from '../../src/domain/chain.js';
import { Web3SolanaClient, solanaEndpoint, type SolanaConnection } from '../../src/providers/solana.js';
import { isSuccessful, parseSystemTransfers, type ParsedTransactionLike } from '../../src/utils/solanaTransferParser.js';

const payer = 'PayerWallet111';
const merchant = 'MerchantWallet111';

function detail(
    signature: string,
    slot: number,
    transfers: SolanaTransactionDetail['transfers'],
    success = true,
    accounts = [payer, merchant]
): SolanaTransactionDetail {
    return { signature, slot, success, accounts, transfers };
}

function lastPage(...items: SolanaSignature[]): Page<SolanaSignature> {
    return { items, nextCursor: null };
}

function sig(signature: string, slot = 1, failed = false): SolanaSignature {
    return { signature, slot, failed };
}

describe('SolanaVerifier', () => {
    let client: {
        isValidAddress: Mock<SolanaLedgerClient['isValidAddress']>;
        getRecentSignatures: Mock<SolanaLedgerClient['getRecentSignatures']>;
        getTransactionDetail: Mock<SolanaLedgerClient['getTransactionDetail']>;
    };

    const request: PaymentRequest = {
        amount: '0.5',
        currency: { kind: 'native' },
        recipient: merchant,
        chain: describeChain({ family: 'solana', network: 'devnet' }),
        nonce: 'nonce-1',
    };

    beforeEach(() => {
        client = {
            isValidAddress: vi.fn<SolanaLedgerClient['isValidAddress']>().mockImplementation(address => address !== 'bad'),
            getRecentSignatures: vi.fn<SolanaLedgerClient['getRecentSignatures']>().mockResolvedValue(lastPage()),
            getTransactionDetail: vi.fn<SolanaLedgerClient['getTransactionDetail']>().mockResolvedValue(null),
        };
    });

    it('accepts the first successful transaction whose transfers cover the amount', async () => {
        client.getRecentSignatures.mockResolvedValue(lastPage(
            sig('sig-failed', 9, true),
            sig('sig-other', 10),
            sig('sig-paid', 11),
            sig('sig-later', 12),
        ));
        client.getTransactionDetail.mockImplementation(async signature => {
            switch (signature) {
                case 'sig-other':
                    return detail(signature, 10, [{ from: payer, to: 'SomeoneElse', lamports: 900000000n }], true, [payer, 'SomeoneElse']);
                case 'sig-paid':
                    return detail(signature, 11, [
                        { from: payer, to: merchant, lamports: 300000000n },
                        { from: payer, to: merchant, lamports: 200000000n },
                    ]);
                default:
                    return detail(signature, 12, [{ from: payer, to: merchant, lamports: 900000000n }]);
            }
        });

        const result = await new SolanaVerifier(client).verifyPayment(request, payer);

        expect(result).toMatchObject({
            isPaid: true,
            paidAmount: '500000000',
            transactionHash: 'sig-paid',
            chain: request.chain,
            transactionLogs: [
                { transactionHash: 'sig-paid', from: payer, to: merchant, value: '500000000', blockNumber: 11, logIndex: 0 },
            ],
        });
        expect(client.getTransactionDetail.mock.calls.map(([signature]) => signature)).toEqual(['sig-other', 'sig-paid']);
    });

    it('ignores transactions that failed on chain', async () => {
        client.getRecentSignatures.mockResolvedValue(lastPage(sig('sig-1', 5)));
        client.getTransactionDetail.mockResolvedValue(
            detail('sig-1', 5, [{ from: payer, to: merchant, lamports: 500000000n }], false)
        );

        const result = await new SolanaVerifier(client).verifyPayment(request, payer);

        expect(result.isPaid).toBe(false);
        expect(result.paidAmount).toBe('0');
        expect(result.transactionLogs).toEqual([]);
    });

    it('reports unpaid when the transfer falls short', async () => {
        client.getRecentSignatures.mockResolvedValue(lastPage(sig('sig-1', 5)));
        client.getTransactionDetail.mockResolvedValue(detail('sig-1', 5, [{ from: payer, to: merchant, lamports: 499999999n }]));

        const result = await new SolanaVerifier(client).verifyPayment(request, payer);

        expect(result.isPaid).toBe(false);
        expect(result.transactionHash).toBeUndefined();
    });

    it('pages with the configured limit', async () => {
        await new SolanaVerifier(client).verifyPayment(request, payer);
        await new SolanaVerifier(client, { transactionLimit: 5 }).verifyPayment(request, payer);

        expect(client.getRecentSignatures.mock.calls).toEqual([[payer, { limit: 50 }], [payer, { limit: 5 }]]);
    });

    describe('payer -> recipient window', () => {
        // Newest first, paged by `before` like getSignaturesForAddress
        function history(signatures: SolanaSignature[]) {
            client.getRecentSignatures.mockImplementation(async (_address, { limit, cursor }) => {
                const start = cursor === undefined ? 0 : signatures.findIndex(s => s.signature === cursor) + 1;
                const items = signatures.slice(start, start + limit);
                const last = items.at(-1);
                return { items, nextCursor: last && items.length === limit ? last.signature : null };
            });
        }

        it('finds a payment behind more unrelated transactions than the limit', async () => {
            const unrelated = Array.from({ length: 60 }, (_, i) => sig(`unrelated-${i}`));
            history([...unrelated, sig('sig-paid', 7)]);
            client.getTransactionDetail.mockImplementation(async signature =>
                signature === 'sig-paid'
                    ? detail(signature, 7, [{ from: payer, to: merchant, lamports: 500000000n }])
                    : detail(signature, 1, [{ from: payer, to: 'Someone', lamports: 1n }], true, [payer, 'Someone'])
            );

            const result = await new SolanaVerifier(client).verifyPayment(request, payer);

            expect(result.isPaid).toBe(true);
            expect(result.transactionHash).toBe('sig-paid');
            expect(client.getRecentSignatures.mock.calls).toEqual([
                [payer, { limit: 50 }],
                [payer, { limit: 50, cursor: 'unrelated-49' }],
            ]);
        });

        it('inspects at most the limit of payer -> recipient transactions', async () => {
            history([sig('short-1'), sig('short-2'), sig('unrelated'), sig('short-3'), sig('sig-paid')]);
            client.getTransactionDetail.mockImplementation(async signature => {
                if (signature === 'unrelated') return detail(signature, 1, [], true, [payer, 'Someone']);
                const lamports = signature === 'sig-paid' ? 500000000n : 1n;
                return detail(signature, 1, [{ from: payer, to: merchant, lamports }]);
            });

            const result = await new SolanaVerifier(client, { transactionLimit: 2 }).verifyPayment(request, payer);

            expect(result.isPaid).toBe(false);
            expect(client.getTransactionDetail.mock.calls.map(([signature]) => signature)).toEqual(['short-1', 'short-2']);
        });

        it('stops paging after a bounded number of pages', async () => {
            client.getRecentSignatures.mockImplementation(async (_address, { cursor }) => {
                const next = `${cursor ?? 'page'}+`;
                return { items: [sig(next)], nextCursor: next };
            });
            client.getTransactionDetail.mockImplementation(async signature => detail(signature, 1, [], true, [payer]));

            const result = await new SolanaVerifier(client, { transactionLimit: 1 }).verifyPayment(request, payer);

            expect(result.isPaid).toBe(false);
            expect(client.getRecentSignatures).toHaveBeenCalledTimes(MAX_SCAN_PAGES);
        });
    });

    it('accepts the same transfer whether the amount is given in SOL or in lamports', async () => {
        client.getRecentSignatures.mockResolvedValue(lastPage(sig('sig-1', 5)));
        client.getTransactionDetail.mockResolvedValue(detail('sig-1', 5, [{ from: payer, to: merchant, lamports: 500000000n }]));
        const verifier = new SolanaVerifier(client);

        const inSol = await verifier.verifyPayment({ ...request, amount: '0.5' }, payer);
        const inLamports = await verifier.verifyPayment({ ...request, amount: '500000000' }, payer);

        expect([inSol.isPaid, inLamports.isPaid]).toEqual([true, true]);
        expect(inSol.paidAmount).toBe('500000000');
    });

    it('treats an integer amount as lamports', async () => {
        client.getRecentSignatures.mockResolvedValue(lastPage(sig('sig-1', 5)));
        client.getTransactionDetail.mockResolvedValue(detail('sig-1', 5, [{ from: payer, to: merchant, lamports: 1000n }]));

        const result = await new SolanaVerifier(client).verifyPayment({ ...request, amount: '1000' }, payer);

        expect(result.isPaid).toBe(true);
        expect(result.paidAmount).toBe('1000');
    });

    it('validates addresses and currency before listing', async () => {
        const verifier = new SolanaVerifier(client);

        await expect(verifier.verifyPayment(request, 'bad'))
            .rejects.toMatchObject({ code: 'INVALID_ADDRESS', message: 'payer address error' });
        await expect(verifier.verifyPayment({ ...request, recipient: 'bad' }, payer))
            .rejects.toMatchObject({ code: 'INVALID_ADDRESS', message: 'recipient address error' });
        await expect(verifier.verifyPayment({ ...request, currency: { kind: 'token', address: 'Mint111', decimals: 6 } }, payer))
            .rejects.toMatchObject({ code: 'INVALID_CURRENCY' });
        expect(client.getRecentSignatures).not.toHaveBeenCalled();
    });

    it('maps ledger failures to RPC errors', async () => {
        client.getRecentSignatures.mockRejectedValueOnce(new Error('429 Too Many Requests'));
        await expect(new SolanaVerifier(client).verifyPayment(request, payer))
            .rejects.toMatchObject({ code: 'RPC_ERROR', message: 'Failed to list transactions: 429 Too Many Requests' });

        client.getRecentSignatures.mockResolvedValue(lastPage(sig('sig-1', 5)));
        client.getTransactionDetail.mockRejectedValue(new Error('socket hang up'));
        await expect(new SolanaVerifier(client).verifyPayment(request, payer))
            .rejects.toMatchObject({ code: 'RPC_ERROR' });
    });

    it('only claims Solana chains', () => {
        const verifier = new SolanaVerifier(client);
        expect(verifier.supportsChain({ family: 'solana', network: 'mainnet' })).toBe(true);
        expect(verifier.supportsChain({ family: 'evm', network: 'ethereum' })).toBe(false);
    });
});

describe('parseSystemTransfers', () => {
    const systemTransfer = (source: string, destination: string, lamports: number | string) => ({
        programId: SystemProgram.programId,
        program: 'system',
        parsed: { type: 'transfer', info: { source, destination, lamports } },
    });

    it('collects top-level and inner System Program transfers', () => {
        const tx: ParsedTransactionLike = {
            meta: {
                err: null,
                innerInstructions: [{ instructions: [systemTransfer('a', 'c', '7')] }],
            },
            transaction: {
                message: {
                    instructions: [
                        systemTransfer('a', 'b', 5),
                        { programId: SystemProgram.programId, program: 'system', parsed: { type: 'createAccount', info: {} } },
                        { programId: SystemProgram.programId, program: 'spl-token', parsed: { type: 'transfer', info: { source: 'x', destination: 'y', lamports: 1 } } },
                        { programId: SystemProgram.programId, accounts: [], data: '3Bxs4h24hBtQy9rw' },
                    ],
                },
            },
        };

        expect(parseSystemTransfers(tx)).toEqual([
            { from: 'a', to: 'b', lamports: 5n },
            { from: 'a', to: 'c', lamports: 7n },
        ]);
        expect(isSuccessful(tx)).toBe(true);
    });

    it('treats missing metadata or an execution error as failure', () => {
        const message = { instructions: [] };
        expect(isSuccessful({ meta: null, transaction: { message } })).toBe(false);
        expect(isSuccessful({ meta: { err: { InstructionError: [0, 'Custom'] } }, transaction: { message } })).toBe(false);
    });
});

describe('Web3SolanaClient', () => {
    const feePayer = new PublicKey(7);

    const parsedTransaction: ParsedTransactionWithMeta = {
        slot: 321,
        meta: {
            fee: 5000,
            preBalances: [],
            postBalances: [],
            err: null,
            innerInstructions: null,
        },
        transaction: {
            signatures: ['sig-1'],
            message: {
                accountKeys: [
                    { pubkey: feePayer, signer: true, writable: true },
                    { pubkey: SystemProgram.programId, signer: false, writable: false },
                ],
                recentBlockhash: 'blockhash',
                instructions: [
                    {
                        programId: SystemProgram.programId,
                        program: 'system',
                        parsed: { type: 'transfer', info: { source: payer, destination: merchant, lamports: 42 } },
                    },
                ],
            },
        },
    };

    const signatureInfo: ConfirmedSignatureInfo = { signature: 'sig-1', slot: 321, err: { InstructionError: [0, 'Custom'] }, memo: null };

    function connection(): SolanaConnection & {
        getSignaturesForAddress: Mock<SolanaConnection['getSignaturesForAddress']>;
        getParsedTransaction: Mock<SolanaConnection['getParsedTransaction']>;
    } {
        return {
            getSignaturesForAddress: vi.fn<SolanaConnection['getSignaturesForAddress']>().mockResolvedValue([signatureInfo]),
            getParsedTransaction: vi.fn<SolanaConnection['getParsedTransaction']>().mockResolvedValue(parsedTransaction),
        };
    }

    it('validates base58 public keys', () => {
        const client = new Web3SolanaClient(connection());
        expect(client.isValidAddress(SystemProgram.programId.toBase58())).toBe(true);
        expect(client.isValidAddress('not a key')).toBe(false);
    });

    it('flags failed signatures and ends the listing on a short page', async () => {
        const conn = connection();
        const page = await new Web3SolanaClient(conn).getRecentSignatures(SystemProgram.programId.toBase58(), { limit: 10 });

        expect(page).toEqual({ items: [{ signature: 'sig-1', slot: 321, failed: true }], nextCursor: null });
        expect(conn.getSignaturesForAddress.mock.calls[0][1]).toEqual({ limit: 10 });
    });

    it('continues a full page before its last signature', async () => {
        const conn = connection();
        conn.getSignaturesForAddress.mockResolvedValue([
            { signature: 'sig-3', slot: 3, err: null, memo: null },
            { signature: 'sig-2', slot: 2, err: null, memo: null },
        ]);
        const page = await new Web3SolanaClient(conn).getRecentSignatures(
            SystemProgram.programId.toBase58(),
            { limit: 2, cursor: 'sig-4' }
        );

        expect(page.nextCursor).toBe('sig-2');
        expect(conn.getSignaturesForAddress.mock.calls[0][1]).toEqual({ limit: 2, before: 'sig-4' });
    });

    it('decodes a parsed transaction into transfers', async () => {
        const conn = connection();
        const result = await new Web3SolanaClient(conn).getTransactionDetail('sig-1');

        expect(result).toEqual({
            signature: 'sig-1',
            slot: 321,
            success: true,
            accounts: [feePayer.toBase58(), SystemProgram.programId.toBase58()],
            transfers: [{ from: payer, to: merchant, lamports: 42n }],
        });
        expect(conn.getParsedTransaction).toHaveBeenCalledWith('sig-1', {
            commitment: 'confirmed',
            maxSupportedTransactionVersion: 0,
        });
    });

    it('returns null for an unknown signature', async () => {
        const conn = connection();
        conn.getParsedTransaction.mockResolvedValue(null);
        await expect(new Web3SolanaClient(conn).getTransactionDetail('missing')).resolves.toBeNull();
    });

    it('resolves endpoints', () => {
        expect(solanaEndpoint('devnet')).toBe('https://api.devnet.solana.com');
        expect(solanaEndpoint('mainnet', 'http://localhost:8899')).toBe('http://localhost:8899');
        expect(solanaEndpoint({ custom: 'http://validator:8899' })).toBe('http://validator:8899');
    });
});
