/**
 * Table change notifications.
 *
 * Writes publish the set of tables they touched once the change is
 * committed. Subscribers can filter by table name.
 *
 * @example
 * ```typescript
 * const stop = db.updates.subscribe((update) => {
 *     refreshTodoList()
 * }, { tables: ['todos'] })
 *
 * stop()
 * ```
 */
import { ObserverEngine } from '@logosdx/observer'


/**
 * Set of tables touched by a committed write.
 */
export class UpdateNotification {

    readonly tables: ReadonlySet<string>

    constructor(tables: Iterable<string>) {

        this.tables = new Set(tables)
    }

    /**
     * Whether any of `tables` was touched. Case-insensitive.
     */
    containsAny(tables: Iterable<string>): boolean {

        const touched = new Set([...this.tables].map((t) => t.toLowerCase()))

        for (const table of tables) {

            if (touched.has(table.toLowerCase())) {

                return true
            }
        }

        return false
    }

    union(other: UpdateNotification): UpdateNotification {

        return new UpdateNotification([...this.tables, ...other.tables])
    }
}


interface UpdateStreamEvents {
    update: UpdateNotification
}

export interface SubscribeOptions {
    /** Only deliver notifications touching one of these tables. */
    tables?: string[]
}


/**
 * Fan-out of UpdateNotifications to any number of subscribers.
 */
export class UpdateStream {

    #events: ObserverEngine<UpdateStreamEvents>

    constructor(name: string = 'updates') {

        this.#events = new ObserverEngine<UpdateStreamEvents>({ name })
    }

    /**
     * Listen for notifications.
     *
     * @returns cleanup function that stops delivery
     */
    subscribe(
        listener: (update: UpdateNotification) => void,
        options: SubscribeOptions = {},
    ): () => void {

        const { tables } = options

        return this.#events.on('update', (update) => {

            if (!tables || update.containsAny(tables)) {

                listener(update)
            }
        })
    }

    /**
     * Resolve with the next matching notification.
     */
    next(options: SubscribeOptions = {}): Promise<UpdateNotification> {

        return new Promise((resolve) => {

            const stop = this.subscribe((update) => {

                stop()
                resolve(update)
            }, options)
        })
    }

    publish(update: UpdateNotification): void {

        if (update.tables.size === 0) {

            return
        }

        this.#events.emit('update', update)
    }
}


const AFFECTED_TABLE = /^\s*(?:INSERT(?:\s+OR\s+\w+)?\s+INTO|REPLACE\s+INTO|UPDATE(?:\s+OR\s+\w+)?|DELETE\s+FROM)\s+(?:(?:"[^"]+"|`[^`]+`|\[[^\]]+\]|\w+)\.)?(?:"([^"]+)"|`([^`]+)`|\[([^\]]+)\]|(\w+))/i

const FULL_ROLLBACK = /^\s*ROLLBACK(?:\s+TRANSACTION)?\s*;?\s*$/i


/**
 * Table a mutating statement writes to, or null for anything else.
 *
 * @example
 * ```typescript
 * affectedTable('INSERT OR REPLACE INTO "todos" (id) VALUES (1)')  // 'todos'
 * affectedTable('DELETE FROM main.lists WHERE id = ?')             // 'lists'
 * affectedTable('SELECT 1')                                        // null
 * ```
 */
export function affectedTable(sql: string): string | null {

    const match = AFFECTED_TABLE.exec(sql)

    if (!match) {

        return null
    }

    return match[1] ?? match[2] ?? match[3] ?? match[4] ?? null
}

/**
 * Whether the statement rolls back the whole open transaction.
 */
export function isFullRollback(sql: string): boolean {

    return FULL_ROLLBACK.test(sql)
}
