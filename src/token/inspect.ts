import { PublicKey, type AccountInfo, type Connection } from "@solana/web3.js";
import type { Address, TokenRegistry } from "../crowdfunding/types.js";

export const TOKEN_PROGRAM_ID = new PublicKey("TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA");
export const TOKEN_2022_PROGRAM_ID = new PublicKey("TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb");

export type AccountReader = Pick<Connection, "getAccountInfo">;

export interface TokenAccountInspection {
  address: Address;
  exists: boolean;
  owner: Address | null;
  dataLength: number;
  /** Account is owned by a token program and carries mint data */
  isTokenMint: boolean;
}

export function describeAccount(address: Address, info: AccountInfo<Buffer> | null): TokenAccountInspection {
  if (!info) {
    return { address, exists: false, owner: null, dataLength: 0, isTokenMint: false };
  }
  const ownedByTokenProgram = info.owner.equals(TOKEN_PROGRAM_ID) || info.owner.equals(TOKEN_2022_PROGRAM_ID);
  return {
    address,
    exists: true,
    owner: info.owner.toBase58(),
    dataLength: info.data.length,
    isTokenMint: ownedByTokenProgram && info.data.length > 0
  };
}

export async function inspectTokenAccount(reader: AccountReader, address: Address): Promise<TokenAccountInspection> {
  const info = await reader.getAccountInfo(new PublicKey(address), "confirmed");
  return describeAccount(address, info);
}

/**
 * TokenRegistry backed by on-chain account inspection. Lookups are synchronous, so
 * addresses have to be loaded with `refresh` before campaigns reference them.
 */
export class MintDirectory implements TokenRegistry {
  private readonly mints = new Set<Address>();

  constructor(private readonly reader: AccountReader) {}

  async refresh(addresses: Address[]): Promise<TokenAccountInspection[]> {
    const results = await Promise.all(addresses.map((address) => inspectTokenAccount(this.reader, address)));
    for (const result of results) {
      if (result.isTokenMint) {
        this.mints.add(result.address);
      } else {
        this.mints.delete(result.address);
      }
    }
    return results;
  }

  isContract(token: Address): boolean {
    return this.mints.has(token);
  }
}
