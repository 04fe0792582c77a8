/**
 * appcompat Core: Application and Build Info
 *
 * The minimal views of an installed application and of the running platform
 * that ChangeState needs to answer isEnabled(). Both are supplied by the
 * caller; nothing here queries a package manager.
 */

/** What ChangeState needs to know about an application. */
export interface ApplicationInfo {
  /** Package name. Absent for synthetic or not-yet-resolved applications. */
  readonly packageName?: string | null | undefined;
  /** The API level the application declares compatibility with. */
  readonly targetSdkVersion: number;
}

/** What ChangeState needs to know about the running platform. */
export interface BuildInfo {
  /**
   * The platform's own target SDK. SDK-gated changes never compare an app
   * against a threshold above this value.
   */
  readonly platformTargetSdk: number;
}
