import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity({ name: 'subscribers' })
export class SubscriberEntity {
  @PrimaryColumn({ type: 'number' })
  chat_id!: number;

  @Column({ type: 'varchar2', length: 256, nullable: true })
  first_name!: string | null;

  @Column({ type: 'varchar2', length: 256, nullable: true })
  last_name!: string | null;

  @Column({ type: 'varchar2', length: 128, nullable: true })
  username!: string | null;

  @Column({ type: 'varchar2', length: 18, nullable: true })
  nip!: string | null;

  @Column({ type: 'timestamp with time zone', nullable: true })
  subscribed_at!: Date | null;

  @Column({ type: 'timestamp with time zone', nullable: true })
  updated_at!: Date | null;
}
