/**
 * The started-by field is the only correlation key ECS offers for ad-hoc
 * task runs. Task groups are encoded into it as `fargate:<group>`; this is the
 * one place that format is known.
 */

const STARTED_BY_PREFIX = 'fargate:';
const STARTED_BY_PATTERN = /fargate:(.*)/;

export function encodeStartedBy(taskGroupName: string): string {
    return `${STARTED_BY_PREFIX}${taskGroupName}`;
}

/**
 * @returns the task group name, or undefined when the tag was not written by us
 */
export function decodeStartedBy(startedBy: string | undefined): string | undefined {
    const matches = startedBy ? STARTED_BY_PATTERN.exec(startedBy) : null;
    return matches ? matches[1] : undefined;
}
