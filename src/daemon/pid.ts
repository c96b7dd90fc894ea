import { mkdir, readFile, unlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

const resolvePidPath = (stateDir: string) => join(stateDir, 'tg-claude-bridge.pid')

export const writePidFile = async (stateDir: string, pid: number) => {
	const pidPath = resolvePidPath(stateDir)
	await mkdir(stateDir, { recursive: true })
	await writeFile(pidPath, String(pid), 'utf-8')
	return pidPath
}

export const readPidFile = async (stateDir: string) => {
	const pidPath = resolvePidPath(stateDir)
	const raw = await readFile(pidPath, 'utf-8')
	const pid = Number(raw.trim())
	if (!Number.isInteger(pid) || pid <= 0) {
		throw new Error(`invalid pid file ${pidPath}`)
	}
	return { pid, pidPath }
}

export const removePidFile = async (stateDir: string) => {
	await unlink(resolvePidPath(stateDir))
}
