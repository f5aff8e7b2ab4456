// Keep pino quiet unless a test opts into a level explicitly.
process.env.PATCHPILE_LOG_LEVEL ??= "silent";
