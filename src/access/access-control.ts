/**
 * AccessControl: role table checked at the entry of every privileged operation.
 *
 * Roles are independent: the owner administers the table, the ledger
 * controller moves locked funds, the relayer submits delegated calls and the
 * keeper runs trigger batches. One account may hold several roles.
 */

import { AuthorizationError, ErrorCode, type LedgerError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export const Role = {
	Owner: "owner",
	LedgerController: "ledger_controller",
	Relayer: "relayer",
	Keeper: "keeper",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export class AccessControl {
	private readonly members: Map<Role, Set<AccountId>>;

	private constructor(owner: AccountId) {
		this.members = new Map<Role, Set<AccountId>>([[Role.Owner, new Set([owner])]]);
	}

	/** Creates a table whose only entry is `owner` in the owner role. */
	static create(owner: AccountId): AccessControl {
		return new AccessControl(owner);
	}

	has(role: Role, account: AccountId): boolean {
		return this.members.get(role)?.has(account) ?? false;
	}

	/**
	 * Fails UNAUTHORIZED unless `caller` holds `role`.
	 * @example
	 * const auth = access.require(Role.Keeper, caller);
	 * if (!auth.ok) return auth;
	 */
	require(role: Role, caller: AccountId): Result<void, LedgerError> {
		if (this.has(role, caller)) return ok(undefined);
		return err(
			new AuthorizationError(`${caller} lacks role ${role}`, ErrorCode.Unauthorized, {
				role,
				caller,
			}),
		);
	}

	/** Owner-only: adds `account` to `role`. */
	grant(caller: AccountId, role: Role, account: AccountId): Result<void, LedgerError> {
		const auth = this.require(Role.Owner, caller);
		if (!auth.ok) return auth;
		const set = this.members.get(role) ?? new Set<AccountId>();
		set.add(account);
		this.members.set(role, set);
		return ok(undefined);
	}

	/** Owner-only: removes `account` from `role`. The last owner cannot be removed. */
	revoke(caller: AccountId, role: Role, account: AccountId): Result<void, LedgerError> {
		const auth = this.require(Role.Owner, caller);
		if (!auth.ok) return auth;
		const set = this.members.get(role);
		if (!set?.has(account)) return ok(undefined);
		if (role === Role.Owner && set.size === 1) {
			return err(
				new AuthorizationError("Cannot revoke the last owner", ErrorCode.Unauthorized, {
					account,
				}),
			);
		}
		set.delete(account);
		return ok(undefined);
	}

	/** Accounts currently holding `role`. */
	holders(role: Role): readonly AccountId[] {
		return [...(this.members.get(role) ?? [])];
	}
}
