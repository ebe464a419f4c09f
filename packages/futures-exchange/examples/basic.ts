import "dotenv/config";
import {
  MexcFuturesClient,
  formatErrorForLogging,
  isDomainError,
  loadMexcFuturesConfigFromEnv
} from "../src/index.js";

// Reads MEXC_WEB_TOKEN (or WEB_TOKEN) from .env; nothing here places an order.
async function main() {
  const client = new MexcFuturesClient(loadMexcFuturesConfigFromEnv());

  if (!(await client.testConnection())) {
    console.error("MEXC futures gateway unreachable");
    process.exitCode = 1;
    return;
  }

  const ticker = await client.getTicker("BTC_USDT");
  console.log(`BTC_USDT last=${ticker.data.lastPrice} funding=${ticker.data.fundingRate}`);

  const depth = await client.getContractDepth("BTC_USDT", 5);
  const [bestAsk] = depth.data.asks;
  const [bestBid] = depth.data.bids;
  console.log(`best bid=${bestBid?.price ?? "-"} best ask=${bestAsk?.price ?? "-"}`);

  const asset = await client.getAccountAsset("USDT");
  console.log(`USDT available=${asset.data.availableBalance} equity=${asset.data.equity}`);

  const positions = await client.getOpenPositions();
  for (const position of positions.data) {
    console.log(`${position.symbol} hold=${position.holdVol} @ ${position.holdAvgPrice} x${position.leverage}`);
  }

  await client.close();
}

main().catch((error: unknown) => {
  console.error(isDomainError(error) ? formatErrorForLogging(error) : error);
  process.exitCode = 1;
});
