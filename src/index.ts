#!/usr/bin/env node
import { loadConfig, validateConfig } from './config';
import { parseCommand, reportFailure, runCommand } from './presentation/cli';

async function main(): Promise<void> {
    const command = parseCommand(process.argv.slice(2));
    console.log(`🎬 Narrated clip pipeline - ${command}`);

    // 1. Load and validate configuration
    console.log('📋 Loading configuration...');
    const config = loadConfig();

    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    // 2. Run the stages
    const result = await runCommand(command, config);

    if (result.finalVideoPath) {
        console.log(`✅ Done - final video: ${result.finalVideoPath}`);
    } else {
        console.log(`✅ Done - ${command} finished`);
    }
}

main().catch((error: unknown) => {
    process.exit(reportFailure(error));
});
