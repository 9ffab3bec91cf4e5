// SPDX-License-Identifier: Apache-2.0

import {type Duration} from './time/duration.js';
import {getZTreeVersion} from '../../version.js';

export function sleep(duration: Duration): Promise<void> {
  return new Promise<void>(resolve => {
    setTimeout(resolve, duration.toMillis());
  });
}

export function getVersion(): string {
  return getZTreeVersion();
}

