export * from './source_row.types';
export * from './omc_entity.types';
