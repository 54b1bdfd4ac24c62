/** Tag namespace queried for existing tags. */
export type TagScope = 'remote' | 'local'
