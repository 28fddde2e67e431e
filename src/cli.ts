#!/usr/bin/env node
/**
 * diarize-transcribe entry point
 */

import { runDiarizeTranscribe } from './Public/Commands/DiarizeTranscribeCommand';

runDiarizeTranscribe(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
