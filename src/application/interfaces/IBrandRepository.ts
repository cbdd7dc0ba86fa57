import { Brand } from '../../domain/entities/Brand';
import { IRepository } from './IRepository';

export interface IBrandRepository extends IRepository<Brand> {
    findByName(name: string): Promise<Brand[]>;
}
