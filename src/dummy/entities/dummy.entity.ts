import { InvalidEntityError } from '../../common/errors/catalog.errors';

export interface Dummy {
    id: number;
    name: string;
}

export function assertValidDummyName(name: string): void {
    if (!name || !name.trim()) {
        throw new InvalidEntityError('Dummy name cannot be empty');
    }
}
