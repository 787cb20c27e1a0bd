#!/usr/bin/env node
import { exit } from 'node:process';

import { main } from './index';

main().catch((err: unknown) => {
    console.error(err);
    exit(1);
});
