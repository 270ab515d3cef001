import PQueue from 'p-queue';

export interface QueueSnapshot {
    concurrency: number;
    /** Tasks holding a slot */
    pending: number;
    /** Tasks waiting for a slot */
    size: number;
}

export interface ThrottleSnapshot {
    global: QueueSnapshot;
    domains: Record<string, QueueSnapshot>;
}

function snapshotOf(queue: PQueue): QueueSnapshot {
    return {
        concurrency: queue.concurrency,
        pending: queue.pending,
        size: queue.size,
    };
}

function checkCapacity(name: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
    }
}

/**
 * One global queue plus one queue per domain, created on first sight of the
 * domain. A task first takes a slot on its domain queue and only then joins
 * the global queue, so a task stuck behind a busy domain holds no global
 * slot.
 */
export class ThrottleRegistry {
    private readonly global: PQueue;
    private readonly domains = new Map<string, PQueue>();

    constructor(
        readonly maxWorker: number,
        readonly workerDomain: number
    ) {
        checkCapacity('Global capacity', maxWorker);
        checkCapacity('Domain capacity', workerDomain);
        this.global = new PQueue({ concurrency: maxWorker });
    }

    private domainQueue(domain: string): PQueue {
        const key = domain.toLowerCase();
        let queue = this.domains.get(key);
        if (!queue) {
            queue = new PQueue({ concurrency: this.workerDomain });
            this.domains.set(key, queue);
        }
        return queue;
    }

    /**
     * Run `task` once it holds a slot on both queues. Both slots stay taken
     * until the promise returned by `task` settles.
     */
    async run(domain: string, task: () => Promise<void>): Promise<void> {
        await this.domainQueue(domain).add(() => this.global.add(task));
    }

    get domainCount(): number {
        return this.domains.size;
    }

    /** Tasks still waiting on either queue */
    get queued(): number {
        let waiting = this.global.size;
        for (const queue of this.domains.values()) {
            waiting += queue.size;
        }
        return waiting;
    }

    /** Tasks holding a global slot */
    get active(): number {
        return this.global.pending;
    }

    snapshot(): ThrottleSnapshot {
        const domains: Record<string, QueueSnapshot> = {};
        for (const [domain, queue] of this.domains) {
            domains[domain] = snapshotOf(queue);
        }
        return { global: snapshotOf(this.global), domains };
    }
}
