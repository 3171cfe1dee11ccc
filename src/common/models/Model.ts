import {
  CreateDateColumn,
  DeleteDateColumn,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * Base class of every entity: numeric id, audit timestamps and soft deletion.
 */
export abstract class Model {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  // Date columns take the driver's own timestamp type
  @CreateDateColumn({ name: 'created_time' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_time' })
  updatedAt!: Date;

  @DeleteDateColumn({ name: 'deleted_time', nullable: true })
  deletedAt: Date | null = null;
}
