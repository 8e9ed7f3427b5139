#!/usr/bin/env node
// src/cli/index.ts

import figlet from 'figlet';
import { rainbow } from 'gradient-string';

import { createProgram } from './program.js';

console.log(rainbow.multiline(
    figlet.textSync('Sticker Press', {
        font: 'Small',
        horizontalLayout: 'default',
        verticalLayout: 'default',
        width: 80,
        whitespaceBreak: true,
    }),
));

await createProgram().parseAsync(process.argv);
