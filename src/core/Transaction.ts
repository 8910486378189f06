import { randomUUID } from 'crypto';
import { TransactionRecord } from './types/ledger.types';

export interface TransactionData {
  txid?: string;
  nama: string;
  nomorSertifikat: string;
  lokasi: string;
  luas: string;
  fileHash?: string | null;
  timestamp?: number;
}

/**
 * A land certificate record waiting for, or embedded in, a block.
 * Instances are frozen on construction.
 */
export class Transaction {
  public readonly txid: string;
  public readonly nama: string;
  public readonly nomorSertifikat: string;
  public readonly lokasi: string;
  public readonly luas: string;
  public readonly fileHash: string | null;
  public readonly timestamp: number;

  constructor(data: TransactionData) {
    this.txid = data.txid || randomUUID();
    this.nama = data.nama;
    this.nomorSertifikat = data.nomorSertifikat;
    this.lokasi = data.lokasi;
    this.luas = data.luas;
    this.fileHash = data.fileHash ?? null;
    this.timestamp = data.timestamp ?? Date.now();
    Object.freeze(this);
  }

  public static create(data: TransactionData): Transaction {
    return new Transaction(data);
  }

  public toJSON(): TransactionRecord {
    return {
      txid: this.txid,
      nama: this.nama,
      nomor_sertifikat: this.nomorSertifikat,
      lokasi: this.lokasi,
      luas: this.luas,
      file_hash: this.fileHash,
      timestamp: this.timestamp
    };
  }

  public static fromJSON(json: TransactionRecord): Transaction {
    return new Transaction({
      txid: json.txid,
      nama: json.nama,
      nomorSertifikat: json.nomor_sertifikat,
      lokasi: json.lokasi,
      luas: json.luas,
      fileHash: json.file_hash,
      timestamp: json.timestamp
    });
  }
}
