/**
 * SERVER STARTUP SCRIPT
 *
 * Builds the ledger from the environment and serves the HTTP API.
 *
 * Run this with: npm start
 */
import {Server} from 'http';
import {makeLedgerSystem} from '../effects/EffectsFactory';
import {createApp} from './app';

function shutdown(server: Server, signal: string): void {
  console.log(`\n🛑 Received ${signal}, shutting down...`);
  server.close(error => {
    if (error) {
      console.error('❌ Failed to close the API server:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

function main(): void {
  console.log('🚀 Starting group-buying ledger...\n');

  try {
    const system = makeLedgerSystem();
    const {ledger, eventStream, server: serverConfig} = system.config;

    console.log('📋 Configuration:');
    console.log('   - Ledger account:', ledger.account);
    console.log('   - Administrators:', ledger.administrators.join(', '));
    console.log('   - Platform fee (bps):', ledger.platformFeeBps);
    console.log('   - Reward rate (bps):', ledger.rewardBps);
    console.log('   - Fee recipient:', ledger.feeRecipient);
    console.log('   - Reward treasury:', ledger.rewardTreasury);
    console.log('   - Reward distributor:', ledger.distributorAccount);
    console.log('   - Event stream:', eventStream ? eventStream.streamName : 'console');
    console.log('');

    const server = createApp(system).listen(serverConfig.port, () => {
      console.log(`✅ API server listening on http://localhost:${serverConfig.port}`);
      console.log(`   Health check: http://localhost:${serverConfig.port}/health`);
      console.log(`   Orders API: http://localhost:${serverConfig.port}/api/orders`);
    });

    process.on('SIGINT', () => shutdown(server, 'SIGINT'));
    process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
  } catch (error) {
    console.error('❌ Failed to start ledger:', error);
    process.exit(1);
  }
}

main();
