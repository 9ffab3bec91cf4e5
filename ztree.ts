#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as ztree from './src/index.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';
import {EXIT_CODE_FATAL} from './src/core/constants.js';

const context: ztree.MainContext = {};
await ztree
  .main(process.argv, context)
  .then(() => {
    context.logger?.info('ztree completed, via entrypoint');
  })
  .catch((error: unknown) => {
    if (!container.isRegistered(InjectTokens.ErrorHandler)) {
      console.error(error);
      process.exitCode = EXIT_CODE_FATAL;
      return;
    }
    const errorHandler: ErrorHandler = container.resolve(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
  });
