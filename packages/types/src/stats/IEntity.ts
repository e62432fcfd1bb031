/**
 * Kind of tracked object on the video platform.
 */
export type EntityType = 'channel' | 'video';

/**
 * Minimal reference to a tracked object: its opaque id and its kind.
 */
export interface IEntityRef {
    entityId: string;
    entityType: EntityType;
}

/**
 * A channel or video the bot tracks.
 *
 * Created from the configured seed list or by the admin. The display name is
 * refreshed only when the upstream returns a newer title; every other record
 * refers to the entity by `entityId` alone.
 */
export interface ITrackedEntity extends IEntityRef {
    displayName: string;
    platform: 'youtube';
    /** Public handle such as `@somechannel`, when known. */
    handle?: string;
    active: boolean;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Input for registering a new tracked entity.
 */
export interface INewTrackedEntity extends IEntityRef {
    displayName: string;
    handle?: string;
}
