import { IsOptional, IsString } from 'class-validator';
import { SubscriberProfile } from '../../subscribers/subscriber.model';

/** `null` and missing fields both mean "leave unchanged". */
export class UpdateSubscriberDto {
  @IsOptional()
  @IsString()
  first_name?: string | null;

  @IsOptional()
  @IsString()
  last_name?: string | null;

  @IsOptional()
  @IsString()
  username?: string | null;

  @IsOptional()
  @IsString()
  nip?: string | null;

  toProfile(): SubscriberProfile {
    return {
      first_name: this.first_name ?? undefined,
      last_name: this.last_name ?? undefined,
      username: this.username ?? undefined,
      nip: this.nip ?? undefined
    };
  }
}
