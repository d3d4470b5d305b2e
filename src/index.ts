import { VpsBot } from './bot';
import { getConfig } from './config';

async function main() {
  console.log('🚀 Starting LXC VPS Discord Bot...');

  try {
    const bot = new VpsBot(getConfig());
    await bot.start();
  } catch (error) {
    console.error('❌ Failed to start bot:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

process.on('unhandledRejection', (error) => {
  console.error('Unhandled promise rejection:', error);
});

void main();
