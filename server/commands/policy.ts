import { KubectlPolicyDecision, KubectlVerb } from "@shared/kubectl";

const UNSAFE_PATTERN = /[;&|`<>\n\r]/;
const VARIABLE_SUBSTITUTION_PATTERN = /\$\(|\$\{|`/;

// The collectors only ever read from the cluster.
const ALLOWED_VERBS = new Set<string>(["get", "logs"]);

// The target cluster comes from configuration, never from a caller.
const CLUSTER_FLAGS = ["--context", "--kubeconfig", "--server", "--token", "--as"];

function isKubectlVerb(value: string): value is KubectlVerb {
  return ALLOWED_VERBS.has(value);
}

export function evaluateKubectlPolicy(args: readonly string[]): KubectlPolicyDecision {
  if (args.length === 0) {
    return { allowed: false, reason: "Command is empty" };
  }

  const unsafe = args.find(
    (arg) => UNSAFE_PATTERN.test(arg) || VARIABLE_SUBSTITUTION_PATTERN.test(arg),
  );
  if (unsafe !== undefined) {
    return { allowed: false, reason: "Command contains unsafe shell operators" };
  }

  const verb = args[0];
  if (!isKubectlVerb(verb)) {
    return { allowed: false, reason: `Subcommand not allowed: ${verb || "<none>"}` };
  }

  const clusterFlag = args.find((arg) =>
    CLUSTER_FLAGS.some((flag) => arg === flag || arg.startsWith(`${flag}=`)),
  );
  if (clusterFlag !== undefined) {
    return { allowed: false, verb, reason: `Flag not allowed: ${clusterFlag.split("=")[0]}` };
  }

  return { allowed: true, verb };
}
