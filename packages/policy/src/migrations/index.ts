import type { QueryInterface, DataTypes as DataTypesType } from 'sequelize';

/**
 * Security policy migrations. The table holds a single row; on PostgreSQL
 * a CHECK constraint pins its id to 1.
 */
export const policyMigrations = {
  async up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void> {
    await queryInterface.createTable('security_policies', {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      primary_country: {
        type: DataTypes.STRING(2),
        allowNull: false,
      },
      secondary_country: {
        type: DataTypes.STRING(2),
        allowNull: true,
      },
      enforcement_enabled: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      admin_email: {
        type: DataTypes.STRING(254),
        allowNull: true,
      },
      it_email: {
        type: DataTypes.STRING(254),
        allowNull: true,
      },
      security_email: {
        type: DataTypes.STRING(254),
        allowNull: true,
      },
      setup_completed: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      setup_completed_by: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      setup_completed_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      previous_primary_country: {
        type: DataTypes.STRING(2),
        allowNull: true,
      },
      primary_country_changed_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      primary_country_changed_by: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      previous_secondary_country: {
        type: DataTypes.STRING(2),
        allowNull: true,
      },
      secondary_country_changed_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      secondary_country_changed_by: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      version: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 1,
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

    if (queryInterface.sequelize.getDialect() === 'postgres') {
      await queryInterface.sequelize.query(
        'ALTER TABLE security_policies ADD CONSTRAINT security_policies_singleton CHECK (id = 1);',
      );
    }
  },

  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('security_policies');
  },
};
