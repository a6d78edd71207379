import { Table, TableIndex, TableForeignKey } from 'typeorm';
import type { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateUsersAndPosts1700000000000 implements MigrationInterface {
  name = 'CreateUsersAndPosts1700000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'users',
        columns: [
          { name: 'id', type: 'integer', isPrimary: true, isGenerated: true, generationStrategy: 'increment' },
          { name: 'username', type: 'varchar', length: '64' },
          { name: 'email', type: 'varchar', length: '120' },
          { name: 'password_hash', type: 'varchar', length: '128', isNullable: true },
          { name: 'about_me', type: 'varchar', length: '140', isNullable: true },
          { name: 'last_seen', type: 'bigint', default: 0 },
          { name: 'created_at', type: 'bigint' },
        ],
      }),
      true
    );

    await queryRunner.createIndices('users', [
      new TableIndex({ name: 'idx_users_username', columnNames: ['username'], isUnique: true }),
      new TableIndex({ name: 'idx_users_email', columnNames: ['email'], isUnique: true }),
    ]);

    await queryRunner.createTable(
      new Table({
        name: 'posts',
        columns: [
          { name: 'id', type: 'integer', isPrimary: true, isGenerated: true, generationStrategy: 'increment' },
          { name: 'body', type: 'varchar', length: '140' },
          { name: 'timestamp', type: 'bigint' },
          { name: 'user_id', type: 'integer' },
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['user_id'],
            referencedTableName: 'users',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          }),
        ],
      }),
      true
    );

    await queryRunner.createIndices('posts', [
      new TableIndex({ name: 'idx_posts_timestamp', columnNames: ['timestamp'] }),
      new TableIndex({ name: 'idx_posts_user', columnNames: ['user_id'] }),
    ]);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('posts');
    await queryRunner.dropTable('users');
  }
}
