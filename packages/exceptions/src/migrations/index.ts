import type { QueryInterface, DataTypes as DataTypesType } from 'sequelize';

/**
 * Access exception migrations.
 *
 * The unique index on (user_id, destination_country, open_slot) keeps at
 * most one open exception per user and destination; NULL slots of closed
 * exceptions never collide.
 */
export const exceptionMigrations = {
  async up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void> {
    await queryInterface.createTable('access_exceptions', {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      user_id: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      destination_country: {
        type: DataTypes.STRING(2),
        allowNull: false,
      },
      reason: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      starts_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      ends_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(10),
        allowNull: false,
        defaultValue: 'PENDING',
      },
      requested_by: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      source_attempt_id: {
        type: DataTypes.UUID,
        allowNull: true,
      },
      decided_by: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      decided_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      decision_notes: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      revoked_by: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      revoked_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      revocation_notes: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      usage_count: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      last_used_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      open_slot: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      created_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      updated_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
    });

    await queryInterface.addIndex('access_exceptions', ['user_id', 'destination_country', 'open_slot'], {
      name: 'uq_access_exceptions_open',
      unique: true,
    });
    await queryInterface.addIndex('access_exceptions', ['status', 'ends_at'], {
      name: 'idx_access_exceptions_status_ends_at',
    });
  },

  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('access_exceptions');
  },
};
