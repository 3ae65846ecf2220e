// Vérification du compte : balance USDC, ou dérivation des credentials API (--derive-keys)
import "dotenv/config";
import { CLOB_HOST } from "../config";
import { PolyClobClient, deriveApiCreds } from "../clients/polySDK";
import { errorMessage } from "../lib/errors";
import { rootLog } from "../logger";

const log = rootLog.child({ name: "account" });

async function main() {
  const privateKey = process.env.PRIVATE_KEY;
  if (!privateKey) {
    throw new Error("Missing required environment variable: PRIVATE_KEY");
  }

  if (process.argv.includes("--derive-keys")) {
    const creds = await deriveApiCreds(privateKey, CLOB_HOST);
    log.info({
      CLOB_API_KEY: creds.key,
      CLOB_API_SECRET: creds.secret,
      CLOB_PASSPHRASE: creds.passphrase
    }, "🔑 API creds derived");
    return;
  }

  const key = process.env.CLOB_API_KEY;
  const secret = process.env.CLOB_API_SECRET;
  const passphrase = process.env.CLOB_PASSPHRASE;
  if (!key || !secret || !passphrase) {
    throw new Error("Missing API creds, run with --derive-keys first");
  }

  const clob = new PolyClobClient({
    privateKey,
    creds: { key, secret, passphrase },
    host: CLOB_HOST,
    funderAddress: process.env.POLY_PROXY_ADDRESS || undefined
  });

  const balance = await clob.getCollateralBalance();
  log.info({
    eoa: clob.getAddress(),
    maker: clob.getMakerAddress(),
    usdc: balance.toFixed(2)
  }, "💰 Account");
}

main().catch((error: unknown) => {
  log.error({ error: errorMessage(error) }, "❌ Account check failed");
  process.exit(1);
});
