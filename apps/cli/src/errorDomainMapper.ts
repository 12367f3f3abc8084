import { isCompletionError } from '@region-complete/completion-core';

import { InputResolveError } from './inputResolver.js';
import { CliUsageError, ConfigError, OutputWriteError } from './errors.js';
import type { CommandOutput } from './types.js';

interface MappedError {
  exitCode: number;
  output: CommandOutput;
  errorCode: string;
}

export class ErrorDomainMapper {
  map(error: unknown): MappedError {
    if (error instanceof CliUsageError || error instanceof InputResolveError) {
      return this.build('E_USAGE', error.message, 2, [
        "Run 'region-complete <command> --help' to list the available options",
      ]);
    }

    if (error instanceof ConfigError) {
      return this.build('CONFIG_ERROR', error.message, 1, [
        "Run 'region-complete config list' to inspect the configured profiles",
      ]);
    }

    if (isCompletionError(error)) {
      switch (error.kind) {
        case 'ConfigurationError':
          return this.build('CONFIG_ERROR', error.message, 1, [
            "Export the API key in the variable named by the profile's credentialEnv",
          ]);
        case 'TransportError':
          return this.build('E_NETWORK', error.message, 1, [
            'Check the network connection and the profile endpoint',
          ]);
        case 'ParsingError':
          return this.build('E_PARSE', error.message, 1, [
            'Check that the endpoint speaks the completions API and the model name is valid',
          ]);
      }
    }

    if (error instanceof OutputWriteError) {
      return this.build('E_WRITE', error.message, 1);
    }

    if (error instanceof Error) {
      return this.build('E_UNEXPECTED', error.message, 1);
    }

    return this.build('E_UNEXPECTED', String(error), 1);
  }

  private build(
    code: string,
    message: string,
    exitCode: number,
    suggestions: string[] = [],
  ): MappedError {
    return {
      exitCode,
      errorCode: code,
      output: {
        kind: 'error',
        code,
        message,
        suggestions,
      },
    };
  }
}
