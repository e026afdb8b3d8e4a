import { run } from './main.js'

// run() reports every failure through core.setFailed
void run()
