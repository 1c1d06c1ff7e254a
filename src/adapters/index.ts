/**
 * external collaborators at the store boundary.
 * interfaces declared here, implementations wrap real I/O (see git.ts).
 */

/**
 * invoked by finalize in external-commit mode with the final title/body.
 * resolves to an opaque state string (e.g. a commit hash) stored verbatim on
 * the entry; a rejection aborts the finalize.
 */
export interface ExternalCommitProvider {
  commit(title: string, body: string): Promise<string>;
}
