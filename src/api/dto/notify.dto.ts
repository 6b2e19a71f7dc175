import { IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { NotifyRequest } from '../../notify/notify.service';

export class NotifyDto implements NotifyRequest {
  @IsString()
  @IsNotEmpty()
  message!: string;

  @IsOptional()
  @IsInt()
  chat_id?: number;

  @IsOptional()
  @IsString()
  username?: string;

  @IsOptional()
  @IsString()
  first_name?: string;

  @IsOptional()
  @IsString()
  last_name?: string;

  @IsOptional()
  @IsString()
  nip?: string;
}
