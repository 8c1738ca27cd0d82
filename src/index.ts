#!/usr/bin/env node
import { CliDriver } from './cli-driver';

new CliDriver().start().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
});
