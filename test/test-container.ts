// SPDX-License-Identifier: Apache-2.0

import {Container, type ContainerOptions} from '../src/core/dependency-injection/container-init.js';
import {getTestCacheDirectory} from './test-utility.js';

/**
 * Re-creates every registration. Tests that need a clean config manager or config provider call this in
 * `beforeEach`.
 */
export function resetForTest(options: ContainerOptions = {}): void {
  Container.getInstance().reset({
    logLevel: 'debug',
    developmentMode: true,
    ...options,
    homeDirectory: options.homeDirectory ?? getTestCacheDirectory(),
  });
}
