import type { QueryInterface, DataTypes as DataTypesType } from 'sequelize';

/**
 * Geo cache migrations. Creates `geo_records` with a unique IP column so
 * concurrent first sightings collapse onto one row.
 */
export const geoMigrations = {
  async up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void> {
    await queryInterface.createTable('geo_records', {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      ip_address: {
        type: DataTypes.STRING(45),
        allowNull: false,
        unique: true,
      },
      country_code: {
        type: DataTypes.STRING(2),
        allowNull: false,
      },
      country_name: {
        type: DataTypes.STRING(100),
        allowNull: true,
      },
      region: {
        type: DataTypes.STRING(100),
        allowNull: true,
      },
      city: {
        type: DataTypes.STRING(100),
        allowNull: true,
      },
      isp: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      organization: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      latitude: {
        type: DataTypes.DOUBLE,
        allowNull: true,
      },
      longitude: {
        type: DataTypes.DOUBLE,
        allowNull: true,
      },
      is_proxy: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      is_vpn: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      is_tor: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      threat_score: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      threat_level: {
        type: DataTypes.STRING(10),
        allowNull: false,
        defaultValue: 'NONE',
      },
      lookup_date: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      first_seen: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      last_seen: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      access_count: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 1,
      },
    });

    await queryInterface.addIndex('geo_records', ['country_code'], {
      name: 'idx_geo_records_country_code',
    });
    await queryInterface.addIndex('geo_records', ['last_seen'], {
      name: 'idx_geo_records_last_seen',
    });
  },

  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('geo_records');
  },
};
