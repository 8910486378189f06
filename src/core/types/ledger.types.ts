import { z } from 'zod';

export const GENESIS_PREVIOUS_HASH = '0';
export const GENESIS_INDEX = 1;

// Wire shapes exchanged with peers. Field names are part of the peer protocol.

export const TransactionRecordSchema = z.object({
  txid: z.string().min(1),
  nama: z.string(),
  nomor_sertifikat: z.string(),
  lokasi: z.string(),
  luas: z.string(),
  file_hash: z.string().nullable().optional(),
  timestamp: z.number()
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

export const BlockRecordSchema = z.object({
  index: z.number().int().positive(),
  timestamp: z.number(),
  transactions: z.array(TransactionRecordSchema),
  proof: z.number().int().nonnegative(),
  previous_hash: z.string(),
  hash: z.string()
});

export type BlockRecord = z.infer<typeof BlockRecordSchema>;

export const ChainResponseSchema = z.object({
  chain: z.array(BlockRecordSchema),
  length: z.number().int().nonnegative()
});

export const MempoolResponseSchema = z.array(TransactionRecordSchema);

export const TransactionInputSchema = z.object({
  nama: z.string().trim().min(1, 'nama is required'),
  nomor_sertifikat: z.string().trim().min(1, 'nomor_sertifikat is required'),
  lokasi: z.string().trim().min(1, 'lokasi is required'),
  luas: z.union([z.string(), z.number()])
    .transform(value => String(value).trim())
    .pipe(z.string().min(1, 'luas is required')),
  file_hash: z.string().regex(/^[0-9a-f]{64}$/, 'file_hash must be a sha256 hex digest').optional()
});

export type TransactionInput = z.infer<typeof TransactionInputSchema>;
