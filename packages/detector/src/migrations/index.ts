import type { QueryInterface, DataTypes as DataTypesType } from 'sequelize';

/**
 * Suspicious access attempt migrations.
 */
export const detectorMigrations = {
  async up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void> {
    await queryInterface.createTable('suspicious_access_attempts', {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      created_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      user_id: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      ip_address: {
        type: DataTypes.STRING(45),
        allowNull: false,
      },
      geo_record_id: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      country_code: {
        type: DataTypes.STRING(2),
        allowNull: true,
      },
      attempt_type: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      was_blocked: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: true,
      },
      user_agent: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      details: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      it_notified: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      it_notified_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      resolved: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      resolved_by: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      resolved_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      resolution_notes: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
    });

    // Escalation counts a user's blocked attempts over a rolling window
    await queryInterface.addIndex('suspicious_access_attempts', ['user_id', 'was_blocked', 'created_at'], {
      name: 'idx_suspicious_attempts_user_blocked_created',
    });
    await queryInterface.addIndex('suspicious_access_attempts', ['resolved', 'created_at'], {
      name: 'idx_suspicious_attempts_resolved_created',
    });
  },

  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('suspicious_access_attempts');
  },
};
