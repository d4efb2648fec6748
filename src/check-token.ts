import { Connection } from "@solana/web3.js";
import { isAddress } from "./crowdfunding/address.js";
import { RPC_URL } from "./env.js";
import { inspectTokenAccount } from "./token/inspect.js";

async function main() {
  const address = process.argv[2]?.trim();
  if (!address || !isAddress(address)) {
    throw new Error("Usage: npm run check-token -- <token mint address>");
  }

  const connection = new Connection(RPC_URL, "confirmed");
  const result = await inspectTokenAccount(connection, address);

  console.log("RPC URL:", RPC_URL);
  console.log("Address:", result.address);
  console.log("Exists:", result.exists);
  console.log("Owner program:", result.owner ?? "-");
  console.log("Data length:", result.dataLength);
  console.log("Usable as campaign token:", result.isTokenMint);

  if (!result.isTokenMint) {
    process.exitCode = 2;
  }
}

main().catch((err) => {
  console.error("Token check failed:", err);
  process.exit(1);
});
