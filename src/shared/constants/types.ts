/**
 * Injection tokens for tsyringe.
 */
export const TYPES = {
    // Infrastructure ports
    Logger: Symbol.for('Logger'),
    ConfigService: Symbol.for('ConfigService'),
    DataAccessSettings: Symbol.for('DataAccessSettings'),
    Clock: Symbol.for('Clock'),
    DynamoDBProvider: Symbol.for('DynamoDBProvider'),
    TableManager: Symbol.for('TableManager'),

    // Repositories
    ProductRepository: Symbol.for('ProductRepository'),
    BrandRepository: Symbol.for('BrandRepository'),
    CategoryRepository: Symbol.for('CategoryRepository'),
    RepositoryFactory: Symbol.for('RepositoryFactory'),
};
