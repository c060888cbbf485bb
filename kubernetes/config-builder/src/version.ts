export interface BuildInfo {
  version: string
  gitCommit: string
  buildDate: string
}

export const getBuildInfo = (env: NodeJS.ProcessEnv = process.env): BuildInfo => ({
  version: env.BUILD_VERSION || 'latest',
  gitCommit: env.BUILD_GIT_COMMIT || 'unknown',
  buildDate: env.BUILD_DATE || 'unknown',
})

export const formatBuildInfo = ({ version, gitCommit, buildDate }: BuildInfo): string =>
  `${version}/${gitCommit}/${buildDate}`
