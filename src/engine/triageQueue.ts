// src/engine/triageQueue.ts

import { Patient } from '../models/Patient';
import { QueueCondition } from '../models/QueueCondition';

/**
 * One link in the chain. Links are arena indices, null at either end.
 */
interface QueueNode {
    patient: Patient;
    next: number | null;  // Toward the rear
    prev: number | null;  // Toward the front
}

/**
 * First-come-first-served admission queue for a single triage desk
 *
 * Doubly-linked chain of nodes stored in an index-addressed arena.
 * Freed arena slots are recycled, so the arena never grows past the
 * largest number of patients queued at once.
 *
 * Invariants (hold before and after every public call):
 * - size equals the number of nodes reachable from head
 * - head and tail are null iff size == 0
 * - adjacent nodes link to each other in both directions
 * - size <= capacity when a capacity is set
 *
 * Performance:
 * - arrive: O(1)
 * - serveNext: O(1)
 * - traverseForward / traverseBackward: O(n) snapshot copies
 */
export class TriageQueue {
    private nodes: (QueueNode | null)[] = [];
    private freeSlots: number[] = [];
    private head: number | null = null;
    private tail: number | null = null;
    private count = 0;
    private readonly maxSize: number | null;

    /**
     * @param capacity Maximum number of queued patients, null for unbounded
     */
    constructor(capacity: number | null = null) {
        if (capacity !== null && (!Number.isInteger(capacity) || capacity < 1)) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
        this.maxSize = capacity;
    }

    size(): number {
        return this.count;
    }

    /**
     * @returns Fixed capacity, or null when unbounded
     */
    capacity(): number | null {
        return this.maxSize;
    }

    isFull(): boolean {
        return this.maxSize !== null && this.count >= this.maxSize;
    }

    isEmpty(): boolean {
        return this.count === 0;
    }

    condition(): QueueCondition {
        if (this.isEmpty()) {
            return QueueCondition.EMPTY;
        }
        return this.isFull() ? QueueCondition.FULL : QueueCondition.PARTIAL;
    }

    /**
     * Admit a patient at the rear
     *
     * The record is accepted as given: empty names, out-of-range severity
     * and duplicate ids are the caller's concern.
     *
     * @returns False if the queue is full (queue unchanged)
     */
    arrive(patient: Patient): boolean {
        if (this.isFull()) {
            return false;
        }

        const index = this.allocate({ patient, next: null, prev: this.tail });

        if (this.tail === null) {
            this.head = index;
        } else {
            this.nodeAt(this.tail).next = index;
        }
        this.tail = index;
        this.count++;

        return true;
    }

    /**
     * Remove and return the patient admitted earliest
     *
     * @returns Front patient, or null if the queue is empty (queue unchanged)
     */
    serveNext(): Patient | null {
        if (this.head === null) {
            return null;
        }

        const index = this.head;
        const node = this.nodeAt(index);

        this.head = node.next;
        if (this.head !== null) {
            this.nodeAt(this.head).prev = null;
        } else {
            this.tail = null;
        }

        this.release(index);
        this.count--;

        return node.patient;
    }

    peekFront(): Patient | null {
        return this.head === null ? null : this.nodeAt(this.head).patient;
    }

    peekRear(): Patient | null {
        return this.tail === null ? null : this.nodeAt(this.tail).patient;
    }

    /**
     * Snapshot of queued patients, front to rear
     */
    traverseForward(): Patient[] {
        const result: Patient[] = [];
        let current = this.head;
        while (current !== null) {
            const node = this.nodeAt(current);
            result.push(node.patient);
            current = node.next;
        }
        return result;
    }

    /**
     * Snapshot of queued patients, rear to front
     */
    traverseBackward(): Patient[] {
        const result: Patient[] = [];
        let current = this.tail;
        while (current !== null) {
            const node = this.nodeAt(current);
            result.push(node.patient);
            current = node.prev;
        }
        return result;
    }

    /**
     * Walk the chain and report every broken invariant
     *
     * Used by the desk simulation and tests; an intact queue yields [].
     */
    findInvariantViolations(): string[] {
        const violations: string[] = [];

        if ((this.head === null) !== (this.count === 0)) {
            violations.push(`head is ${this.head === null ? 'empty' : 'set'} but size is ${this.count}`);
        }
        if ((this.tail === null) !== (this.count === 0)) {
            violations.push(`tail is ${this.tail === null ? 'empty' : 'set'} but size is ${this.count}`);
        }
        if (this.maxSize !== null && this.count > this.maxSize) {
            violations.push(`size ${this.count} exceeds capacity ${this.maxSize}`);
        }

        let reachable = 0;
        let previous: number | null = null;
        let current = this.head;
        // Bounded walk so a cycle cannot hang the check
        while (current !== null && reachable <= this.nodes.length) {
            const node = this.nodes[current];
            if (!node) {
                violations.push(`link points at free slot ${current}`);
                break;
            }
            if (node.prev !== previous) {
                violations.push(`slot ${current} prev link is ${node.prev}, expected ${previous}`);
            }
            reachable++;
            previous = current;
            current = node.next;
        }

        if (reachable !== this.count) {
            violations.push(`size is ${this.count} but ${reachable} nodes are reachable from head`);
        }
        if (previous !== this.tail) {
            violations.push(`chain ends at slot ${previous} but tail is ${this.tail}`);
        }

        return violations;
    }

    private allocate(node: QueueNode): number {
        const reused = this.freeSlots.pop();
        if (reused !== undefined) {
            this.nodes[reused] = node;
            return reused;
        }
        this.nodes.push(node);
        return this.nodes.length - 1;
    }

    private release(index: number): void {
        this.nodes[index] = null;
        this.freeSlots.push(index);
    }

    private nodeAt(index: number): QueueNode {
        const node = this.nodes[index];
        if (!node) {
            throw new Error(`Queue chain references free slot ${index}`);
        }
        return node;
    }
}
