import type { QueryInterface, DataTypes as DataTypesType } from 'sequelize';

const APPEND_ONLY_TABLES = ['audit_entries', 'audit_tamper_notes'] as const;

/**
 * Audit ledger migrations.
 *
 * Creates `audit_entries` and `audit_tamper_notes` with triggers that
 * reject UPDATE and DELETE on both tables. PostgreSQL and SQLite are
 * covered; other dialects rely on the model hooks alone.
 */
export const auditMigrations = {
  async up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void> {
    await queryInterface.createTable('audit_entries', {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      created_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      actor_id: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      change_type: {
        type: DataTypes.STRING(30),
        allowNull: false,
      },
      old_value: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      new_value: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      justification: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      ip_address: {
        type: DataTypes.STRING(45),
        allowNull: true,
      },
      user_agent: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      notification_sent: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      recipient_count: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      checksum: {
        type: DataTypes.STRING(64),
        allowNull: false,
      },
    });

    await queryInterface.addIndex('audit_entries', ['created_at'], {
      name: 'idx_audit_entries_created_at',
    });
    await queryInterface.addIndex('audit_entries', ['change_type'], {
      name: 'idx_audit_entries_change_type',
    });
    await queryInterface.addIndex('audit_entries', ['actor_id'], {
      name: 'idx_audit_entries_actor_id',
    });

    await queryInterface.createTable('audit_tamper_notes', {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      entry_id: {
        type: DataTypes.UUID,
        allowNull: false,
      },
      stored_checksum: {
        type: DataTypes.STRING(64),
        allowNull: false,
      },
      computed_checksum: {
        type: DataTypes.STRING(64),
        allowNull: false,
      },
      detected_by: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      detected_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
    });

    await queryInterface.addIndex('audit_tamper_notes', ['entry_id'], {
      name: 'idx_audit_tamper_notes_entry_id',
    });

    const dialect = queryInterface.sequelize.getDialect();

    if (dialect === 'postgres') {
      await queryInterface.sequelize.query(`
        CREATE OR REPLACE FUNCTION prevent_append_only_modification()
        RETURNS TRIGGER AS $$
        BEGIN
          RAISE EXCEPTION '% is append-only: % is not permitted', TG_TABLE_NAME, TG_OP;
          RETURN NULL;
        END;
        $$ LANGUAGE plpgsql;
      `);

      for (const table of APPEND_ONLY_TABLES) {
        await queryInterface.sequelize.query(`
          CREATE TRIGGER ${table}_prevent_update
          BEFORE UPDATE ON ${table}
          FOR EACH ROW
          EXECUTE FUNCTION prevent_append_only_modification();
        `);
        await queryInterface.sequelize.query(`
          CREATE TRIGGER ${table}_prevent_delete
          BEFORE DELETE ON ${table}
          FOR EACH ROW
          EXECUTE FUNCTION prevent_append_only_modification();
        `);
      }
    }

    if (dialect === 'sqlite') {
      for (const table of APPEND_ONLY_TABLES) {
        await queryInterface.sequelize.query(`
          CREATE TRIGGER ${table}_prevent_update
          BEFORE UPDATE ON ${table}
          BEGIN
            SELECT RAISE(ABORT, '${table} is append-only: UPDATE is not permitted');
          END;
        `);
        await queryInterface.sequelize.query(`
          CREATE TRIGGER ${table}_prevent_delete
          BEFORE DELETE ON ${table}
          BEGIN
            SELECT RAISE(ABORT, '${table} is append-only: DELETE is not permitted');
          END;
        `);
      }
    }
  },

  async down(queryInterface: QueryInterface): Promise<void> {
    const dialect = queryInterface.sequelize.getDialect();

    for (const table of APPEND_ONLY_TABLES) {
      if (dialect === 'postgres') {
        await queryInterface.sequelize.query(`DROP TRIGGER IF EXISTS ${table}_prevent_delete ON ${table};`);
        await queryInterface.sequelize.query(`DROP TRIGGER IF EXISTS ${table}_prevent_update ON ${table};`);
      } else if (dialect === 'sqlite') {
        await queryInterface.sequelize.query(`DROP TRIGGER IF EXISTS ${table}_prevent_delete;`);
        await queryInterface.sequelize.query(`DROP TRIGGER IF EXISTS ${table}_prevent_update;`);
      }
    }

    if (dialect === 'postgres') {
      await queryInterface.sequelize.query('DROP FUNCTION IF EXISTS prevent_append_only_modification();');
    }

    await queryInterface.dropTable('audit_tamper_notes');
    await queryInterface.dropTable('audit_entries');
  },
};
