// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsInt, IsOptional, Min} from 'class-validator';

@Exclude()
export class SessionSettings {
  @Expose()
  @IsOptional()
  @IsInt()
  @Min(1)
  public timeoutMillis?: number;

  @Expose()
  @IsOptional()
  @IsInt()
  @Min(1)
  public connectTimeoutMillis?: number;
}
