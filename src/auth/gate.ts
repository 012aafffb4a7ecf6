import { UserId } from '../types';

export interface AdminDirectory {
    isAdmin(userId: UserId): boolean;
    getAdmins(): Set<UserId>;
}

/**
 * Decides who may change bot configuration. Only `add_admin` has a bootstrap
 * path: while there are no administrators at all, anyone may add the first one.
 */
export class AuthorizationGate {
    constructor(private readonly directory: AdminDirectory) {}

    canManage(userId: UserId | undefined): boolean {
        return userId !== undefined && this.directory.isAdmin(userId);
    }

    canAddAdmin(userId: UserId | undefined, admins: ReadonlySet<UserId> = this.directory.getAdmins()): boolean {
        if (admins.size === 0) return true;
        return userId !== undefined && admins.has(userId);
    }
}
