import {
    ConsoleLogger,
    MissingRolesError,
    RoleChecker,
    StaticRoleSubject,
    bindRoleChecks,
    createAuthorizationContext,
} from '../src/index.js';

// Define some example roles
const ROLES = {
    ADMIN: 'admin',
    EDITOR: 'editor',
    VIEWER: 'viewer',
};

// Example document storage
const documents = new Map<string, { title: string; content: string }>([
    ['doc-1', { title: 'Welcome', content: 'Hello world' }],
]);

function main() {
    const logger = new ConsoleLogger({ app: 'docs-example' }, 'debug');
    const checker = new RoleChecker({ debug: true });

    const editor = new StaticRoleSubject([ROLES.EDITOR, ROLES.VIEWER], 'editor-user');
    const viewer = new StaticRoleSubject([ROLES.VIEWER], 'viewer-user');

    // One context per request; here the editor is logged in
    const checks = bindRoleChecks(createAuthorizationContext({ user: editor, logger }), checker);

    checks.assertUserRoles(ROLES.EDITOR);
    documents.set('doc-2', { title: 'Draft', content: 'Work in progress' });
    logger.info('Document created', { id: 'doc-2' });

    // Boolean form, e.g. to decide whether to show a delete button
    logger.info('Delete allowed?', { allowed: checks.checkUserRoles(ROLES.ADMIN) });

    // Checking someone other than the logged in user
    try {
        checks.assertUserRoles(viewer, ROLES.EDITOR);
    } catch (err) {
        if (err instanceof MissingRolesError) {
            logger.warn('Viewer may not edit', { missing: [...err.missing] });
        } else {
            throw err;
        }
    }
}

main();
