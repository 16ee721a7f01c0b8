#!/usr/bin/env node
import {main} from '../lib/cli';

main(process.argv).then(exitCode => {
    process.exitCode = exitCode;
}).catch(e => {
    console.error(e);
    process.exitCode = 1;
});
