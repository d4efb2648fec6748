import { describe, expect, it } from "vitest";
import { PublicKey, SystemProgram, type AccountInfo } from "@solana/web3.js";
import { MintDirectory, TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID, inspectTokenAccount, type AccountReader } from "../../src/token/inspect.js";
import { makeKeypair, pubkey } from "../helpers/participants.js";

function account(owner: PublicKey, dataLength: number): AccountInfo<Buffer> {
  return { executable: false, owner, lamports: 1_461_600, data: Buffer.alloc(dataLength), rentEpoch: 0 };
}

class FakeAccountReader implements AccountReader {
  private readonly accounts = new Map<string, AccountInfo<Buffer>>();

  set(address: string, info: AccountInfo<Buffer>): void {
    this.accounts.set(address, info);
  }

  async getAccountInfo(publicKey: PublicKey): Promise<AccountInfo<Buffer> | null> {
    return this.accounts.get(publicKey.toBase58()) ?? null;
  }
}

describe("token account inspection", () => {
  const mint = pubkey(makeKeypair(50));
  const mint2022 = pubkey(makeKeypair(51));
  const wallet = pubkey(makeKeypair(10));
  const missing = pubkey(makeKeypair(60));

  function reader(): FakeAccountReader {
    const fake = new FakeAccountReader();
    fake.set(mint, account(TOKEN_PROGRAM_ID, 82));
    fake.set(mint2022, account(TOKEN_2022_PROGRAM_ID, 82));
    fake.set(wallet, account(SystemProgram.programId, 0));
    return fake;
  }

  it("recognises mints owned by either token program", async () => {
    const fake = reader();
    expect(await inspectTokenAccount(fake, mint)).toEqual({
      address: mint,
      exists: true,
      owner: TOKEN_PROGRAM_ID.toBase58(),
      dataLength: 82,
      isTokenMint: true
    });
    expect((await inspectTokenAccount(fake, mint2022)).isTokenMint).toBe(true);
  });

  it("rejects wallets and missing accounts", async () => {
    const fake = reader();
    expect((await inspectTokenAccount(fake, wallet)).isTokenMint).toBe(false);
    expect(await inspectTokenAccount(fake, missing)).toEqual({
      address: missing,
      exists: false,
      owner: null,
      dataLength: 0,
      isTokenMint: false
    });
  });

  it("serves refreshed lookups synchronously", async () => {
    const fake = reader();
    const directory = new MintDirectory(fake);
    expect(directory.isContract(mint)).toBe(false);

    await directory.refresh([mint, wallet, missing]);
    expect(directory.isContract(mint)).toBe(true);
    expect(directory.isContract(wallet)).toBe(false);
    expect(directory.isContract(missing)).toBe(false);

    fake.set(mint, account(SystemProgram.programId, 0));
    await directory.refresh([mint]);
    expect(directory.isContract(mint)).toBe(false);
  });
});
