// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsInt, IsOptional, Min} from 'class-validator';

@Exclude()
export class RetrySettings {
  @Expose()
  @IsOptional()
  @IsInt()
  @Min(1)
  public maxAttempts?: number;

  @Expose()
  @IsOptional()
  @IsInt()
  @Min(0)
  public backoffMillis?: number;
}
